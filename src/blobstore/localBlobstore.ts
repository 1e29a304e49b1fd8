import { promises as fs } from "fs";
import path from "path";
import { assertSafeBlobstoreId } from "../versions/localVersionStorage.js";
import type { BlobstoreClient, BlobstoreFetchResult } from "./types.js";

/** Blobstore backed by a plain directory: object `<id>` lives at `<blobstorePath>/<id>`. */
export class LocalBlobstoreClient implements BlobstoreClient<"local"> {
  readonly provider = "local" as const;

  constructor(readonly blobstorePath: string) {}

  private objectPath(blobstoreId: string): string {
    assertSafeBlobstoreId(blobstoreId);
    return path.join(this.blobstorePath, blobstoreId);
  }

  async fetch(blobstoreId: string): Promise<BlobstoreFetchResult> {
    let objectPath: string;
    try {
      objectPath = this.objectPath(blobstoreId);
    } catch (err) {
      return { ok: false, error: { kind: "transport", message: err instanceof Error ? err.message : String(err), cause: err } };
    }
    try {
      return { ok: true, bytes: await fs.readFile(objectPath) };
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        return { ok: false, error: { kind: "not_found", message: `object ${blobstoreId} not found in ${this.blobstorePath}`, cause: err } };
      }
      return { ok: false, error: { kind: "transport", message: err instanceof Error ? err.message : String(err), cause: err } };
    }
  }

  /** Used by tests and local tooling to seed objects. */
  async put(blobstoreId: string, bytes: Buffer): Promise<void> {
    const objectPath = this.objectPath(blobstoreId);
    await fs.mkdir(this.blobstorePath, { recursive: true });
    await fs.writeFile(objectPath, bytes);
  }
}
