export type BlobstoreProvider = "local" | "simple";

export type BlobstoreFailureKind = "not_found" | "transport" | "http";

export interface BlobstoreFailure {
  kind: BlobstoreFailureKind;
  message: string;
  cause?: unknown;
}

export type BlobstoreFetchResult = { ok: true; bytes: Buffer } | { ok: false; error: BlobstoreFailure };

export interface BlobstoreClient<P extends BlobstoreProvider = BlobstoreProvider> {
  readonly provider: P;
  /** Fetches an object by id. Transport problems come back as `ok: false`, never as a rejection. */
  fetch(blobstoreId: string): Promise<BlobstoreFetchResult>;
}
