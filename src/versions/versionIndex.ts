import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import { InvalidVersionIndexError } from "../core/errors.js";

export const VERSION_INDEX_FILE = "index.yml";

export interface VersionRecord {
  /** Map key in index.yml; carried for diagnostics only. */
  key: string;
  version: string;
  sha1: string;
  blobstoreId: string;
}

interface RawEntry {
  key: string;
  fields: ReadonlyMap<unknown, unknown> | null;
}

function scalarToString(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "bigint") return value.toString();
  return null;
}

/**
 * Version records of one artifact in one tier (final or dev), read from
 * `<storageDir>/index.yml`. Entries keep document order so the first match of
 * a scan is deterministic.
 */
export class VersionIndex {
  private constructor(
    readonly storageDir: string,
    private readonly entries: readonly RawEntry[]
  ) {}

  static empty(storageDir: string): VersionIndex {
    return new VersionIndex(storageDir, []);
  }

  static async load(storageDir: string): Promise<VersionIndex> {
    const indexPath = path.join(storageDir, VERSION_INDEX_FILE);
    let text: string;
    try {
      text = await fs.readFile(indexPath, "utf8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return VersionIndex.empty(storageDir);
      throw err;
    }
    return VersionIndex.parse(storageDir, text, indexPath);
  }

  static parse(storageDir: string, text: string, sourcePath: string): VersionIndex {
    let doc: unknown;
    try {
      // Maps keep insertion order even for integer-like keys, unlike plain objects.
      doc = YAML.parse(text, { mapAsMap: true }) as unknown;
    } catch (err) {
      throw new InvalidVersionIndexError(`invalid version index at ${sourcePath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (doc === null || doc === undefined) return VersionIndex.empty(storageDir);
    if (!(doc instanceof Map)) throw new InvalidVersionIndexError(`invalid version index at ${sourcePath}: expected a mapping`);

    const builds: unknown = doc.get("builds");
    if (builds === null || builds === undefined) return VersionIndex.empty(storageDir);
    if (!(builds instanceof Map)) throw new InvalidVersionIndexError(`invalid version index at ${sourcePath}: builds must be a mapping`);

    const entries: RawEntry[] = [];
    for (const [key, value] of builds) {
      entries.push({ key: scalarToString(key) ?? String(key), fields: value instanceof Map ? value : null });
    }
    return new VersionIndex(storageDir, entries);
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * First record whose `sha1` equals the requested checksum. Records without a
   * string `sha1` never match.
   */
  findBySha1(sha1: string): VersionRecord | null {
    const entry = this.entries.find((e) => e.fields?.get("sha1") === sha1);
    if (!entry?.fields) return null;

    const blobstoreId = entry.fields.get("blobstore_id");
    if (typeof blobstoreId !== "string" || blobstoreId.length === 0) {
      throw new InvalidVersionIndexError(`version index ${this.storageDir} entry ${entry.key} has no blobstore_id`);
    }
    const version = scalarToString(entry.fields.get("version")) ?? entry.key;
    return { key: entry.key, version, sha1, blobstoreId };
  }
}
