#!/usr/bin/env node
import { promises as fs } from "fs";
import path from "path";
import { createBlobstoreClient } from "../src/blobstore/createBlobstoreClient.js";
import { loadReleaseConfig } from "../src/config/releaseConfig.js";
import { compileRelease } from "../src/release/releaseCompiler.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/release_compile.ts --manifest <release.yml> [--release-dir <dir>] [--out <release.tgz>]",
    "                                  [--package-matches <sha1,sha1,...>] [--package-matches-file <file>]",
    "",
    "notes:",
    "  - blobstore settings come from <release-dir>/config/final.yml and config/private.yml",
    "  - --package-matches-file takes one checksum per line (sha1 or fingerprint)",
    "",
    "env:",
    "  RELEASE_DIR (default for --release-dir, else the working directory)",
    "  RELEASE_TMP_DIR (optional, parent of the staging directory)",
    ""
  ].join("\n");
}

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (key === "help") {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

async function readPackageMatches(args: Record<string, string | boolean>): Promise<string[]> {
  const out: string[] = [];
  const inline = args["package-matches"];
  if (typeof inline === "string") out.push(...inline.split(","));
  const file = args["package-matches-file"];
  if (typeof file === "string") out.push(...(await fs.readFile(file, "utf8")).split(/\r?\n/));
  return out.map((s) => s.trim()).filter((s) => s.length > 0);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }

  const manifest = args.manifest;
  if (typeof manifest !== "string") throw new Error(`--manifest is required\n\n${usage()}`);

  const releaseDirArg = args["release-dir"];
  const releaseDir = path.resolve(typeof releaseDirArg === "string" ? releaseDirArg : (process.env.RELEASE_DIR ?? process.cwd()));
  const out = args.out;

  const config = await loadReleaseConfig(releaseDir);
  const result = await compileRelease({
    manifestPath: path.resolve(manifest),
    releaseDir: config.releaseDir,
    blobstore: createBlobstoreClient(config.blobstore),
    packageMatches: await readPackageMatches(args),
    ...(typeof out === "string" ? { tarballPath: path.resolve(out) } : {}),
    ...(process.env.RELEASE_TMP_DIR ? { tmpDir: process.env.RELEASE_TMP_DIR } : {})
  });

  if (result.status === "built") {
    const skipped = [...result.packages, ...result.jobs].filter((o) => o.status === "skipped").length;
    if (skipped) process.stderr.write(`note: ${skipped} artifact(s) skipped as already known remotely\n`);
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
