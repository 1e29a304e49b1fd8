import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { InvalidManifestError } from "../core/errors.js";

export type ArtifactKind = "package" | "job";

export function artifactDirName(kind: ArtifactKind): "packages" | "jobs" {
  return kind === "package" ? "packages" : "jobs";
}

/** Names become directory and file names, so they must be a single path segment. */
export function isSafeArtifactName(name: string): boolean {
  return name.length > 0 && name !== "." && name !== ".." && !/[/\\\0]/.test(name);
}

export interface ArtifactDescriptor {
  name: string;
  version: string;
  sha1: string;
  fingerprint?: string;
}

export interface ReleaseManifest {
  name: string;
  version: string;
  packages: readonly ArtifactDescriptor[];
  jobs: readonly ArtifactDescriptor[];
}

// YAML happily reads `version: 1` as a number.
const zScalarString = z
  .union([z.string(), z.number()])
  .transform((v) => String(v))
  .pipe(z.string().min(1));

const zArtifactDescriptor = z
  .object({
    name: z.string().min(1).refine(isSafeArtifactName, "must be a single path segment"),
    version: zScalarString,
    sha1: z.string().min(1),
    fingerprint: z.string().min(1).nullish()
  })
  .transform((a): ArtifactDescriptor => {
    const out: ArtifactDescriptor = { name: a.name, version: a.version, sha1: a.sha1 };
    if (a.fingerprint) out.fingerprint = a.fingerprint;
    return out;
  });

const zReleaseManifest = z.object({
  name: z.string().min(1),
  version: zScalarString,
  packages: z.array(zArtifactDescriptor),
  jobs: z.array(zArtifactDescriptor)
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length ? issue.path.map((p) => String(p)).join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

export function parseReleaseManifest(text: string, sourcePath: string): ReleaseManifest {
  let raw: unknown;
  try {
    raw = YAML.parse(text) as unknown;
  } catch (err) {
    throw new InvalidManifestError(sourcePath, [err instanceof Error ? err.message : String(err)]);
  }
  const parsed = zReleaseManifest.safeParse(raw);
  if (!parsed.success) throw new InvalidManifestError(sourcePath, formatIssues(parsed.error));
  return Object.freeze({
    name: parsed.data.name,
    version: parsed.data.version,
    packages: Object.freeze(parsed.data.packages),
    jobs: Object.freeze(parsed.data.jobs)
  });
}

export async function loadReleaseManifest(manifestPath: string): Promise<ReleaseManifest> {
  const text = await fs.readFile(manifestPath, "utf8");
  return parseReleaseManifest(text, manifestPath);
}
