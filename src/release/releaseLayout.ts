import path from "path";
import { InvalidArtifactNameError } from "../core/errors.js";
import { artifactDirName, isSafeArtifactName, type ArtifactKind } from "./manifest.js";

export type BuildTier = "final" | "dev";

/** Search order: released builds are authoritative over development builds. */
export const BUILD_TIERS: readonly BuildTier[] = ["final", "dev"];

const TIER_DIRS: Record<BuildTier, string> = {
  final: ".final_builds",
  dev: ".dev_builds"
};

export function assertSafeArtifactName(name: string): void {
  if (!isSafeArtifactName(name)) throw new InvalidArtifactNameError(name);
}

/** `<releaseDir>/.final_builds/packages/<name>` and friends; holds both index.yml and the cached tarballs. */
export function tierStorageDir(releaseDir: string, tier: BuildTier, kind: ArtifactKind, name: string): string {
  assertSafeArtifactName(name);
  return path.join(releaseDir, TIER_DIRS[tier], artifactDirName(kind), name);
}

export function defaultTarballPath(manifestPath: string, name: string, version: string): string {
  return path.join(path.dirname(manifestPath), `${name}-${version}.tgz`);
}
