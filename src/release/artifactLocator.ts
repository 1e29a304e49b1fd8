import { sha1File, sha1Hex } from "../core/checksum.js";
import { ArtifactNotFoundError, BlobstoreError, ChecksumMismatchError, InvalidVersionIndexError } from "../core/errors.js";
import type { BlobstoreClient } from "../blobstore/types.js";
import { VersionIndex, type VersionRecord } from "../versions/versionIndex.js";
import { InvalidBlobstoreIdError, LocalVersionStorage, assertSafeBlobstoreId } from "../versions/localVersionStorage.js";
import type { ArtifactDescriptor, ArtifactKind } from "./manifest.js";
import { BUILD_TIERS, tierStorageDir, type BuildTier } from "./releaseLayout.js";

export type LocatedSource = "cache" | "blobstore";

export interface LocatedArtifact {
  path: string;
  tier: BuildTier;
  source: LocatedSource;
  /** Version declared by the winning index record, which may differ from the manifest's. */
  version: string;
  sha1: string;
  blobstoreId: string;
}

export interface IndexMatch {
  tier: BuildTier;
  index: VersionIndex;
  record: VersionRecord;
}

export interface ArtifactLocatorDeps {
  releaseDir: string;
  blobstore: BlobstoreClient;
}

export type ArtifactRequest = Pick<ArtifactDescriptor, "name" | "version" | "sha1">;

/**
 * Resolves an artifact requested by checksum to a local tarball: final index
 * first, then dev; the winning tier's local storage first, then the blobstore.
 */
export class ArtifactLocator {
  constructor(private readonly deps: ArtifactLocatorDeps) {}

  async openIndex(tier: BuildTier, kind: ArtifactKind, name: string): Promise<VersionIndex> {
    return VersionIndex.load(tierStorageDir(this.deps.releaseDir, tier, kind, name));
  }

  async findRecord(kind: ArtifactKind, name: string, sha1: string): Promise<IndexMatch | null> {
    for (const tier of BUILD_TIERS) {
      const index = await this.openIndex(tier, kind, name);
      const record = index.findBySha1(sha1);
      if (record) return { tier, index, record };
    }
    return null;
  }

  async locate(kind: ArtifactKind, request: ArtifactRequest): Promise<LocatedArtifact> {
    const match = await this.findRecord(kind, request.name, request.sha1);
    if (!match) throw new ArtifactNotFoundError(kind, request.name, request.version, request.sha1);

    const { tier, index, record } = match;
    try {
      assertSafeBlobstoreId(record.blobstoreId);
    } catch (err) {
      if (err instanceof InvalidBlobstoreIdError) {
        throw new InvalidVersionIndexError(`version index ${index.storageDir} entry ${record.key}: ${err.message}`);
      }
      throw err;
    }

    const desc = `${kind} ${request.name} (${record.version})`;
    const storage = new LocalVersionStorage(index.storageDir);
    const located = { tier, version: record.version, sha1: record.sha1, blobstoreId: record.blobstoreId };

    const cachedPath = await storage.lookup(record.blobstoreId);
    if (cachedPath) {
      const { sha1: actual } = await sha1File(cachedPath);
      if (actual !== record.sha1) throw new ChecksumMismatchError(`cached ${desc} at ${cachedPath}`, record.sha1, actual);
      return { ...located, path: cachedPath, source: "cache" };
    }

    const fetched = await this.deps.blobstore.fetch(record.blobstoreId);
    if (!fetched.ok) {
      throw new BlobstoreError(`Blobstore error: ${fetched.error.message}`, { cause: fetched.error.cause ?? fetched.error });
    }

    const actual = sha1Hex(fetched.bytes);
    if (actual !== record.sha1) throw new ChecksumMismatchError(`downloaded ${desc}`, record.sha1, actual);

    const storedPath = await storage.store(record.blobstoreId, fetched.bytes);
    return { ...located, path: storedPath, source: "blobstore" };
  }
}
