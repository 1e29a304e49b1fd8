import type { BlobstoreConfig } from "../config/releaseConfig.js";
import { LocalBlobstoreClient } from "./localBlobstore.js";
import { SimpleBlobstoreClient, type FetchLike, type SimpleBlobstoreOptions } from "./simpleBlobstore.js";
import type { BlobstoreClient } from "./types.js";

export function createBlobstoreClient(config: BlobstoreConfig, opts: { fetchImpl?: FetchLike } = {}): BlobstoreClient {
  switch (config.provider) {
    case "local":
      return new LocalBlobstoreClient(config.blobstorePath);
    case "simple": {
      const simple: SimpleBlobstoreOptions = { endpoint: config.endpoint };
      if (config.user !== undefined) simple.user = config.user;
      if (config.password !== undefined) simple.password = config.password;
      if (opts.fetchImpl) simple.fetchImpl = opts.fetchImpl;
      return new SimpleBlobstoreClient(simple);
    }
  }
}
