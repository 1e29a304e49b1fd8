import { assertSafeBlobstoreId } from "../versions/localVersionStorage.js";
import type { BlobstoreClient, BlobstoreFetchResult } from "./types.js";

export type FetchLike = (input: string, init?: { method?: string; headers?: Record<string, string> }) => Promise<Response>;

export interface SimpleBlobstoreOptions {
  endpoint: string;
  user?: string;
  password?: string;
  fetchImpl?: FetchLike;
}

const MAX_DIAGNOSTIC_CHARS = 2048;

/** HTTP blobstore: `GET <endpoint>/<id>`, optionally with basic auth. */
export class SimpleBlobstoreClient implements BlobstoreClient<"simple"> {
  readonly provider = "simple" as const;
  private readonly endpoint: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: FetchLike;

  constructor(opts: SimpleBlobstoreOptions) {
    this.endpoint = opts.endpoint.replace(/\/+$/, "");
    this.headers = {};
    if (opts.user !== undefined) {
      const token = Buffer.from(`${opts.user}:${opts.password ?? ""}`, "utf8").toString("base64");
      this.headers.Authorization = `Basic ${token}`;
    }
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  objectUrl(blobstoreId: string): string {
    assertSafeBlobstoreId(blobstoreId);
    return `${this.endpoint}/${encodeURIComponent(blobstoreId)}`;
  }

  async fetch(blobstoreId: string): Promise<BlobstoreFetchResult> {
    let url: string;
    let res: Response;
    try {
      url = this.objectUrl(blobstoreId);
      res = await this.fetchImpl(url, { method: "GET", headers: this.headers });
    } catch (err) {
      return { ok: false, error: { kind: "transport", message: err instanceof Error ? err.message : String(err), cause: err } };
    }

    if (res.status === 404) {
      return { ok: false, error: { kind: "not_found", message: `object ${blobstoreId} not found at ${url}` } };
    }
    if (!res.ok) {
      const body = await res
        .text()
        .catch((err: unknown) => `<unreadable response body: ${err instanceof Error ? err.message : String(err)}>`);
      const diagnostic = body.trim().slice(0, MAX_DIAGNOSTIC_CHARS);
      return {
        ok: false,
        error: { kind: "http", message: `GET ${url} returned ${res.status}${diagnostic ? `: ${diagnostic}` : ""}` }
      };
    }

    try {
      return { ok: true, bytes: Buffer.from(await res.arrayBuffer()) };
    } catch (err) {
      return { ok: false, error: { kind: "transport", message: err instanceof Error ? err.message : String(err), cause: err } };
    }
  }
}
