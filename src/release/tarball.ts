import { promises as fs } from "fs";
import { execFile } from "child_process";
import path from "path";
import { promisify } from "util";
import { ArchiveCreationFailedError } from "../core/errors.js";

const execFileAsync = promisify(execFile);

function execFailureOutput(err: unknown): string {
  if (!err || typeof err !== "object") return String(err);
  const stdout = "stdout" in err ? err.stdout : undefined;
  const stderr = "stderr" in err ? err.stderr : undefined;
  const parts: string[] = [];
  for (const v of [stdout, stderr]) {
    if (typeof v === "string" && v.trim().length > 0) parts.push(v.trim());
  }
  if (parts.length === 0 && err instanceof Error) parts.push(err.message);
  return parts.join("\n");
}

/**
 * Gzipped tar of everything under `sourceDir`, rooted at `.`, written to `outPath`.
 * A failed run leaves nothing at `outPath`.
 */
export async function createReleaseTarball(input: { sourceDir: string; outPath: string }): Promise<{ sizeBytes: number }> {
  const outPath = path.resolve(input.outPath);
  await fs.mkdir(path.dirname(outPath), { recursive: true });

  try {
    await execFileAsync("tar", ["-czf", outPath, "-C", input.sourceDir, "."]);
  } catch (err) {
    await fs.rm(outPath, { force: true });
    throw new ArchiveCreationFailedError(execFailureOutput(err));
  }

  const st = await fs.stat(outPath);
  return { sizeBytes: st.size };
}
