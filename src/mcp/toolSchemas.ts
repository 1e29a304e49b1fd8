import * as z from "zod/v4";

export const zArtifactKind = z.enum(["package", "job"]);
export const zBuildTier = z.enum(["final", "dev"]);
export const zLocatedSource = z.enum(["cache", "blobstore"]);

const zChecksum = z.string().min(1).max(256);
const zRelativeOrAbsolutePath = z.string().min(1).max(4096);

export const zReleaseCompileInput = z.object({
  manifest_path: zRelativeOrAbsolutePath,
  tarball_path: zRelativeOrAbsolutePath.optional(),
  package_matches: z.array(zChecksum).max(100000).default([])
});

const zArtifactOutcome = z.object({
  name: z.string(),
  version: z.string(),
  sha1: z.string(),
  status: z.enum(["skipped", "copied"]),
  tier: zBuildTier.nullable(),
  source: zLocatedSource.nullable(),
  blobstore_id: z.string().nullable()
});

export const zReleaseCompileOutput = z.object({
  status: z.enum(["built", "already_built"]),
  release_name: z.string(),
  release_version: z.string(),
  tarball_path: z.string(),
  size_bytes: z.number().int().nonnegative().nullable(),
  packages: z.array(zArtifactOutcome),
  jobs: z.array(zArtifactOutcome)
});

export const zArtifactLocateInput = z.object({
  kind: zArtifactKind,
  name: z.string().min(1).max(256),
  version: z.string().min(1).max(256),
  sha1: zChecksum
});

export const zArtifactLocateOutput = z.object({
  path: z.string(),
  tier: zBuildTier,
  source: zLocatedSource,
  version: z.string(),
  sha1: z.string(),
  blobstore_id: z.string()
});
