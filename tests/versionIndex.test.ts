import { describe, it, expect } from "vitest";
import { mkdtemp, readFile, readdir, rm } from "fs/promises";
import os from "os";
import path from "path";

import { InvalidVersionIndexError } from "../src/core/errors.js";
import { VersionIndex } from "../src/versions/versionIndex.js";
import { InvalidBlobstoreIdError, LocalVersionStorage } from "../src/versions/localVersionStorage.js";
import { writeUtf8 } from "./helpers/releaseFixture.js";

describe("VersionIndex", () => {
  it("treats a missing index.yml as an empty index", async () => {
    const tmpDir = await mkdtemp(path.join(os.tmpdir(), "release-index-"));
    try {
      const index = await VersionIndex.load(path.join(tmpDir, "does-not-exist"));
      expect(index.size).toBe(0);
      expect(index.findBySha1("abc")).toBeNull();
    } finally {
      await rm(tmpDir, { recursive: true, force: true });
    }
  });

  it("returns the first matching record in document order", async () => {
    const tmpDir = await mkdtemp(path.join(os.tmpdir(), "release-index-"));
    try {
      await writeUtf8(
        tmpDir,
        "index.yml",
        [
          "---",
          "builds:",
          "  10:",
          "    version: '10'",
          "    sha1: same",
          "    blobstore_id: first",
          "  2:",
          "    version: '2'",
          "    sha1: same",
          "    blobstore_id: second",
          "format-version: '2'",
          ""
        ].join("\n")
      );
      const index = await VersionIndex.load(tmpDir);
      expect(index.size).toBe(2);
      expect(index.findBySha1("same")).toEqual({ key: "10", version: "10", sha1: "same", blobstoreId: "first" });
    } finally {
      await rm(tmpDir, { recursive: true, force: true });
    }
  });

  it("uses the record's own version, not the index key", () => {
    const index = VersionIndex.parse(
      "/releases/demo/.dev_builds/packages/p1",
      ["builds:", "  fingerprint-xyz:", "    version: 7", "    sha1: abc", "    blobstore_id: B1", ""].join("\n"),
      "index.yml"
    );
    expect(index.findBySha1("abc")).toEqual({ key: "fingerprint-xyz", version: "7", sha1: "abc", blobstoreId: "B1" });
  });

  it("never matches records without a sha1", () => {
    const index = VersionIndex.parse(
      "/tmp/x",
      ["builds:", "  a:", "    version: '1'", "    blobstore_id: B1", "  b: ~", "  c:", "    version: '3'", "    sha1: abc", "    blobstore_id: B3", ""].join("\n"),
      "index.yml"
    );
    expect(index.findBySha1("abc")?.blobstoreId).toBe("B3");
    expect(index.findBySha1("")).toBeNull();
  });

  it("rejects a matched record without a blobstore_id", () => {
    const index = VersionIndex.parse("/tmp/x", ["builds:", "  a:", "    version: '1'", "    sha1: abc", ""].join("\n"), "index.yml");
    expect(() => index.findBySha1("abc")).toThrow(InvalidVersionIndexError);
  });

  it("treats empty builds as an empty index and rejects non-mapping builds", () => {
    expect(VersionIndex.parse("/tmp/x", "builds: ~\n", "index.yml").size).toBe(0);
    expect(VersionIndex.parse("/tmp/x", "", "index.yml").size).toBe(0);
    expect(() => VersionIndex.parse("/tmp/x", "builds:\n  - a\n", "index.yml")).toThrow(InvalidVersionIndexError);
    expect(() => VersionIndex.parse("/tmp/x", "- a\n", "index.yml")).toThrow(InvalidVersionIndexError);
  });
});

describe("LocalVersionStorage", () => {
  it("stores by blobstore id and finds the file afterwards", async () => {
    const tmpDir = await mkdtemp(path.join(os.tmpdir(), "release-storage-"));
    try {
      const storageDir = path.join(tmpDir, ".dev_builds", "packages", "p1");
      const storage = new LocalVersionStorage(storageDir);
      expect(await storage.lookup("B1")).toBeNull();

      const stored = await storage.store("B1", Buffer.from("p1 tarball bytes"));
      expect(stored).toBe(path.join(storageDir, "B1.tgz"));
      expect(await storage.lookup("B1")).toBe(stored);
      expect(await readFile(stored, "utf8")).toBe("p1 tarball bytes");

      await storage.store("B1", Buffer.from("p1 tarball bytes"));
      expect(await readFile(stored, "utf8")).toBe("p1 tarball bytes");
    } finally {
      await rm(tmpDir, { recursive: true, force: true });
    }
  });

  it("lets concurrent writers of the same entry all succeed", async () => {
    const tmpDir = await mkdtemp(path.join(os.tmpdir(), "release-storage-"));
    try {
      const storageDir = path.join(tmpDir, ".final_builds", "jobs", "j1");
      const storage = new LocalVersionStorage(storageDir);
      const bytes = Buffer.from("j1 tarball bytes");

      const stored = await Promise.all(Array.from({ length: 50 }, () => storage.store("B1", bytes)));

      expect(new Set(stored)).toEqual(new Set([path.join(storageDir, "B1.tgz")]));
      expect(await readFile(path.join(storageDir, "B1.tgz"), "utf8")).toBe("j1 tarball bytes");
      expect(await readdir(storageDir)).toEqual(["B1.tgz"]);
    } finally {
      await rm(tmpDir, { recursive: true, force: true });
    }
  });

  it("refuses blobstore ids that would escape the storage dir", async () => {
    const storage = new LocalVersionStorage("/tmp/storage");
    for (const id of ["", "..", "../x", "a/b", "a\\b"]) {
      await expect(storage.lookup(id)).rejects.toBeInstanceOf(InvalidBlobstoreIdError);
    }
  });
});
