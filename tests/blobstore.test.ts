import { describe, it, expect, vi } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";

import { LocalBlobstoreClient } from "../src/blobstore/localBlobstore.js";
import { SimpleBlobstoreClient } from "../src/blobstore/simpleBlobstore.js";
import { createBlobstoreClient } from "../src/blobstore/createBlobstoreClient.js";

describe("LocalBlobstoreClient", () => {
  it("fetches stored objects and reports missing ones as not_found", async () => {
    const tmpDir = await mkdtemp(path.join(os.tmpdir(), "release-blobs-"));
    try {
      const client = new LocalBlobstoreClient(tmpDir);
      await client.put("B1", Buffer.from("blob one"));

      const hit = await client.fetch("B1");
      expect(hit.ok).toBe(true);
      if (hit.ok) expect(hit.bytes.toString("utf8")).toBe("blob one");

      const miss = await client.fetch("B2");
      expect(miss.ok).toBe(false);
      if (!miss.ok) expect(miss.error.kind).toBe("not_found");
    } finally {
      await rm(tmpDir, { recursive: true, force: true });
    }
  });

  it("returns a transport failure for unsafe ids instead of throwing", async () => {
    const result = await new LocalBlobstoreClient("/tmp/blobs").fetch("../etc/passwd");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("transport");
  });
});

describe("SimpleBlobstoreClient", () => {
  it("GETs <endpoint>/<id> with basic auth", async () => {
    const fetchImpl = vi.fn(async (_input: string, _init?: { method?: string; headers?: Record<string, string> }) => new Response("blob-bytes"));
    const client = new SimpleBlobstoreClient({ endpoint: "http://blobs.invalid/", user: "ci", password: "test-secret", fetchImpl });

    const result = await client.fetch("abc-123");
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.bytes.toString("utf8")).toBe("blob-bytes");

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl).toHaveBeenCalledWith("http://blobs.invalid/abc-123", {
      method: "GET",
      headers: { Authorization: `Basic ${Buffer.from("ci:test-secret").toString("base64")}` }
    });
  });

  it("maps 404, other statuses and thrown errors to failure kinds", async () => {
    const notFound = new SimpleBlobstoreClient({
      endpoint: "http://blobs.invalid",
      fetchImpl: async () => new Response("", { status: 404 })
    });
    const r404 = await notFound.fetch("x");
    expect(r404).toEqual({ ok: false, error: { kind: "not_found", message: "object x not found at http://blobs.invalid/x" } });

    const broken = new SimpleBlobstoreClient({
      endpoint: "http://blobs.invalid",
      fetchImpl: async () => new Response("boom", { status: 500 })
    });
    const r500 = await broken.fetch("x");
    expect(r500).toEqual({ ok: false, error: { kind: "http", message: "GET http://blobs.invalid/x returned 500: boom" } });

    const offline = new SimpleBlobstoreClient({
      endpoint: "http://blobs.invalid",
      fetchImpl: async () => {
        throw new Error("connect ECONNREFUSED");
      }
    });
    const rDown = await offline.fetch("x");
    expect(rDown.ok).toBe(false);
    if (!rDown.ok) {
      expect(rDown.error.kind).toBe("transport");
      expect(rDown.error.message).toBe("connect ECONNREFUSED");
    }
  });
});

describe("createBlobstoreClient", () => {
  it("builds the configured provider", () => {
    expect(createBlobstoreClient({ provider: "local", blobstorePath: "/tmp/blobs" }).provider).toBe("local");
    expect(createBlobstoreClient({ provider: "simple", endpoint: "http://blobs.invalid" }).provider).toBe("simple");
  });
});
