import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";

import { loadReleaseConfig } from "../src/config/releaseConfig.js";
import { InvalidReleaseConfigError } from "../src/core/errors.js";
import { writeUtf8 } from "./helpers/releaseFixture.js";

describe("loadReleaseConfig", () => {
  const savedEndpoint = process.env.TEST_BLOBSTORE_ENDPOINT;

  afterEach(() => {
    if (savedEndpoint === undefined) delete process.env.TEST_BLOBSTORE_ENDPOINT;
    else process.env.TEST_BLOBSTORE_ENDPOINT = savedEndpoint;
  });

  it("resolves a local blobstore path against the release dir", async () => {
    const releaseDir = await mkdtemp(path.join(os.tmpdir(), "release-config-"));
    try {
      await writeUtf8(releaseDir, "config/final.yml", "blobstore:\n  provider: local\n  options:\n    blobstore_path: blobs\n");
      const config = await loadReleaseConfig(releaseDir);
      expect(config).toEqual({
        releaseDir: path.resolve(releaseDir),
        blobstore: { provider: "local", blobstorePath: path.resolve(releaseDir, "blobs") }
      });
    } finally {
      await rm(releaseDir, { recursive: true, force: true });
    }
  });

  it("merges private.yml credentials and expands env tokens", async () => {
    const releaseDir = await mkdtemp(path.join(os.tmpdir(), "release-config-"));
    try {
      process.env.TEST_BLOBSTORE_ENDPOINT = "http://blobs.invalid:25250";
      await writeUtf8(
        releaseDir,
        "config/final.yml",
        "blobstore:\n  provider: simple\n  options:\n    endpoint: ${TEST_BLOBSTORE_ENDPOINT}\n"
      );
      await writeUtf8(releaseDir, "config/private.yml", "blobstore:\n  simple:\n    user: agent\n    password: test-secret\n");

      const config = await loadReleaseConfig(releaseDir);
      expect(config.blobstore).toEqual({
        provider: "simple",
        endpoint: "http://blobs.invalid:25250",
        user: "agent",
        password: "test-secret"
      });
    } finally {
      await rm(releaseDir, { recursive: true, force: true });
    }
  });

  it("rejects missing, unset-token and unknown-provider configs", async () => {
    const releaseDir = await mkdtemp(path.join(os.tmpdir(), "release-config-"));
    try {
      await expect(loadReleaseConfig(releaseDir)).rejects.toBeInstanceOf(InvalidReleaseConfigError);

      delete process.env.TEST_BLOBSTORE_ENDPOINT;
      await writeUtf8(releaseDir, "config/final.yml", "blobstore:\n  provider: simple\n  options:\n    endpoint: $TEST_BLOBSTORE_ENDPOINT\n");
      await expect(loadReleaseConfig(releaseDir)).rejects.toBeInstanceOf(InvalidReleaseConfigError);

      await writeUtf8(releaseDir, "config/final.yml", "blobstore:\n  provider: s3\n  options: {}\n");
      await expect(loadReleaseConfig(releaseDir)).rejects.toBeInstanceOf(InvalidReleaseConfigError);
    } finally {
      await rm(releaseDir, { recursive: true, force: true });
    }
  });
});
