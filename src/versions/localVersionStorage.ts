import { randomUUID } from "crypto";
import { promises as fs } from "fs";
import path from "path";

export class InvalidBlobstoreIdError extends Error {
  constructor(blobstoreId: string) {
    super(`invalid blobstore id: ${JSON.stringify(blobstoreId)}`);
    this.name = "InvalidBlobstoreIdError";
  }
}

export function assertSafeBlobstoreId(blobstoreId: string): void {
  if (blobstoreId.length === 0 || blobstoreId === "." || blobstoreId === ".." || /[/\\\0]/.test(blobstoreId)) {
    throw new InvalidBlobstoreIdError(blobstoreId);
  }
}

/**
 * Directory cache of artifact tarballs for one version index, keyed by
 * blobstore id. Content for an id never changes, so concurrent writers of the
 * same entry are harmless: each writes a private temp file and renames it in.
 */
export class LocalVersionStorage {
  constructor(readonly storageDir: string) {}

  filePath(blobstoreId: string): string {
    assertSafeBlobstoreId(blobstoreId);
    return path.join(this.storageDir, `${blobstoreId}.tgz`);
  }

  async lookup(blobstoreId: string): Promise<string | null> {
    const filePath = this.filePath(blobstoreId);
    try {
      const st = await fs.stat(filePath);
      return st.isFile() ? filePath : null;
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
      throw err;
    }
  }

  async store(blobstoreId: string, bytes: Buffer): Promise<string> {
    const filePath = this.filePath(blobstoreId);
    await fs.mkdir(this.storageDir, { recursive: true });
    const tmpPath = `${filePath}.${randomUUID()}.tmp`;
    try {
      await fs.writeFile(tmpPath, bytes);
      await fs.rename(tmpPath, filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      throw err;
    }
    return filePath;
  }
}
