import { createHash } from "crypto";
import { promises as fs } from "fs";

export function sha1Hex(data: string | Buffer): string {
  return createHash("sha1").update(data).digest("hex");
}

export async function sha1File(filePath: string): Promise<{ sha1: string; sizeBytes: number }> {
  const hash = createHash("sha1");
  const fd = await fs.open(filePath, "r");
  try {
    const buf = Buffer.alloc(1024 * 1024);
    let total = 0;
    for (;;) {
      const { bytesRead } = await fd.read(buf, 0, buf.length, null);
      if (bytesRead === 0) break;
      total += bytesRead;
      hash.update(buf.subarray(0, bytesRead));
    }
    return { sha1: hash.digest("hex"), sizeBytes: total };
  } finally {
    await fd.close();
  }
}
