import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { InvalidReleaseConfigError } from "../core/errors.js";

export const FINAL_CONFIG_FILE = path.join("config", "final.yml");
export const PRIVATE_CONFIG_FILE = path.join("config", "private.yml");

export interface LocalBlobstoreConfig {
  provider: "local";
  blobstorePath: string;
}

export interface SimpleBlobstoreConfig {
  provider: "simple";
  endpoint: string;
  user?: string;
  password?: string;
}

export type BlobstoreConfig = LocalBlobstoreConfig | SimpleBlobstoreConfig;

export interface ReleaseConfig {
  releaseDir: string;
  blobstore: BlobstoreConfig;
}

const zFinalConfig = z.object({
  blobstore: z.discriminatedUnion("provider", [
    z.object({
      provider: z.literal("local"),
      options: z.object({ blobstore_path: z.string().min(1) })
    }),
    z.object({
      provider: z.literal("simple"),
      options: z.object({
        endpoint: z.string().min(1),
        user: z.string().optional(),
        password: z.string().optional()
      })
    })
  ])
});

const zPrivateConfig = z
  .object({
    blobstore: z
      .object({
        simple: z.object({ user: z.string().optional(), password: z.string().optional() }).optional()
      })
      .optional()
  })
  .nullable();

function expandEnvToken(value: string): string | null {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m) return value;
  const varName = m[1];
  if (!varName) return null;
  const v = process.env[varName]?.trim();
  return v ? v : null;
}

function requireExpanded(value: string, label: string, source: string): string {
  const expanded = expandEnvToken(value);
  if (expanded === null) throw new InvalidReleaseConfigError(`${source}: ${label} refers to an unset environment variable (${value})`);
  return expanded;
}

function optionalExpanded(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  return expandEnvToken(value) ?? undefined;
}

async function readYamlIfExists(filePath: string): Promise<unknown> {
  try {
    return YAML.parse(await fs.readFile(filePath, "utf8")) as unknown;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return undefined;
    if (err instanceof Error && err.name.startsWith("YAML")) {
      throw new InvalidReleaseConfigError(`${filePath}: ${err.message}`);
    }
    throw err;
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.map((p) => String(p)).join(".") || "(root)"}: ${i.message}`).join("; ");
}

export async function loadReleaseConfig(releaseDir: string): Promise<ReleaseConfig> {
  const root = path.resolve(releaseDir);
  const finalPath = path.join(root, FINAL_CONFIG_FILE);
  const privatePath = path.join(root, PRIVATE_CONFIG_FILE);

  const finalRaw = await readYamlIfExists(finalPath);
  if (finalRaw === undefined) throw new InvalidReleaseConfigError(`missing release config: ${finalPath}`);
  const finalParsed = zFinalConfig.safeParse(finalRaw);
  if (!finalParsed.success) throw new InvalidReleaseConfigError(`${finalPath}: ${describeIssues(finalParsed.error)}`);

  const privateRaw = await readYamlIfExists(privatePath);
  const privateParsed = zPrivateConfig.safeParse(privateRaw ?? null);
  if (!privateParsed.success) throw new InvalidReleaseConfigError(`${privatePath}: ${describeIssues(privateParsed.error)}`);

  const bs = finalParsed.data.blobstore;

  if (bs.provider === "local") {
    const blobstorePath = requireExpanded(bs.options.blobstore_path, "blobstore.options.blobstore_path", finalPath);
    return { releaseDir: root, blobstore: { provider: "local", blobstorePath: path.resolve(root, blobstorePath) } };
  }

  const credentials = privateParsed.data?.blobstore?.simple;
  const blobstore: SimpleBlobstoreConfig = {
    provider: "simple",
    endpoint: requireExpanded(bs.options.endpoint, "blobstore.options.endpoint", finalPath)
  };
  const user = optionalExpanded(credentials?.user ?? bs.options.user);
  const password = optionalExpanded(credentials?.password ?? bs.options.password);
  if (user !== undefined) blobstore.user = user;
  if (password !== undefined) blobstore.password = password;
  return { releaseDir: root, blobstore };
}
