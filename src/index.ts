import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createBlobstoreClient } from "./blobstore/createBlobstoreClient.js";
import { loadReleaseConfig } from "./config/releaseConfig.js";
import { createReleaseServer } from "./mcp/releaseServer.js";

async function main(): Promise<void> {
  const releaseDir = process.env.RELEASE_DIR ?? process.cwd();
  const tmpDir = process.env.RELEASE_TMP_DIR;

  const config = await loadReleaseConfig(releaseDir);
  const blobstore = createBlobstoreClient(config.blobstore);

  const server = createReleaseServer({
    releaseDir: config.releaseDir,
    blobstore,
    ...(tmpDir ? { tmpDir } : {})
  });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`release-compiler gateway ready (${config.releaseDir}, blobstore=${config.blobstore.provider})`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
