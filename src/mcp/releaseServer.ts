import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import path from "path";
import type { BlobstoreClient } from "../blobstore/types.js";
import {
  ArchiveCreationFailedError,
  ArtifactNotFoundError,
  BlobstoreError,
  ChecksumMismatchError,
  InvalidArtifactNameError,
  InvalidManifestError,
  InvalidVersionIndexError
} from "../core/errors.js";
import { ArtifactLocator } from "../release/artifactLocator.js";
import { ReleaseCompiler, type ArtifactOutcome, type CompileResult } from "../release/releaseCompiler.js";
import { StreamReporter, type CompileReporter } from "../release/reporter.js";
import { zArtifactLocateInput, zArtifactLocateOutput, zReleaseCompileInput, zReleaseCompileOutput } from "./toolSchemas.js";

export interface ReleaseServerDeps {
  releaseDir: string;
  blobstore: BlobstoreClient;
  tmpDir?: string;
  /** Progress lines; stdout belongs to the stdio transport, so the default is stderr. */
  reporter?: CompileReporter;
}

function resolveInside(baseDir: string, p: string, label: string): string {
  const full = path.resolve(baseDir, p);
  const rel = path.relative(baseDir, full);
  if (rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    throw new McpError(ErrorCode.InvalidParams, `${label} must stay inside the release directory: ${p}`);
  }
  return full;
}

function toMcpError(err: unknown): unknown {
  if (err instanceof McpError) return err;
  if (err instanceof ArtifactNotFoundError || err instanceof InvalidManifestError || err instanceof InvalidArtifactNameError) {
    return new McpError(ErrorCode.InvalidParams, err.message);
  }
  if (err instanceof InvalidVersionIndexError) return new McpError(ErrorCode.InvalidRequest, err.message);
  if (err instanceof ChecksumMismatchError || err instanceof BlobstoreError || err instanceof ArchiveCreationFailedError) {
    return new McpError(ErrorCode.InternalError, err.message);
  }
  return err;
}

async function compileAndDispose(compiler: ReleaseCompiler): Promise<CompileResult> {
  try {
    return await compiler.compile();
  } finally {
    await compiler.dispose();
  }
}

function toOutcomeJson(o: ArtifactOutcome) {
  const { name, version, sha1 } = o.descriptor;
  if (o.status === "skipped") return { name, version, sha1, status: o.status, tier: null, source: null, blobstore_id: null };
  return { name, version, sha1, status: o.status, tier: o.located.tier, source: o.located.source, blobstore_id: o.located.blobstoreId };
}

export function createReleaseServer(deps: ReleaseServerDeps): McpServer {
  const mcp = new McpServer({
    name: "release-compiler",
    version: "0.1.0"
  });

  const releaseDir = path.resolve(deps.releaseDir);
  const reporter = deps.reporter ?? new StreamReporter(process.stderr);
  const locator = new ArtifactLocator({ releaseDir, blobstore: deps.blobstore });

  mcp.registerTool(
    "release_compile",
    {
      description: "Compile a release tarball from a release manifest, skipping packages the destination already has.",
      inputSchema: zReleaseCompileInput,
      outputSchema: zReleaseCompileOutput
    },
    async (args) => {
      try {
        const manifestPath = resolveInside(releaseDir, args.manifest_path, "manifest_path");
        const tarballPath = args.tarball_path ? resolveInside(releaseDir, args.tarball_path, "tarball_path") : undefined;

        const compiler = await ReleaseCompiler.create({
          manifestPath,
          releaseDir,
          blobstore: deps.blobstore,
          packageMatches: args.package_matches,
          reporter,
          ...(tarballPath ? { tarballPath } : {}),
          ...(deps.tmpDir ? { tmpDir: deps.tmpDir } : {})
        });

        const result = await compileAndDispose(compiler);
        const structured = {
          status: result.status,
          release_name: compiler.manifest.name,
          release_version: compiler.manifest.version,
          tarball_path: result.tarballPath,
          size_bytes: result.status === "built" ? result.sizeBytes : null,
          packages: result.status === "built" ? result.packages.map(toOutcomeJson) : [],
          jobs: result.status === "built" ? result.jobs.map(toOutcomeJson) : []
        };

        const text =
          result.status === "built"
            ? `Generated ${result.tarballPath}`
            : `You already have this version in ${result.tarballPath}`;
        return { content: [{ type: "text", text }], structuredContent: structured };
      } catch (err) {
        throw toMcpError(err);
      }
    }
  );

  mcp.registerTool(
    "artifact_locate",
    {
      description: "Resolve a package or job by checksum to a local tarball (final builds, then dev builds, then blobstore).",
      inputSchema: zArtifactLocateInput,
      outputSchema: zArtifactLocateOutput
    },
    async (args) => {
      try {
        const located = await locator.locate(args.kind, { name: args.name, version: args.version, sha1: args.sha1 });
        const structured = {
          path: located.path,
          tier: located.tier,
          source: located.source,
          version: located.version,
          sha1: located.sha1,
          blobstore_id: located.blobstoreId
        };
        return {
          content: [{ type: "text", text: `${args.kind} ${args.name} -> ${located.path} (${located.tier}, ${located.source})` }],
          structuredContent: structured
        };
      } catch (err) {
        throw toMcpError(err);
      }
    }
  );

  return mcp;
}
