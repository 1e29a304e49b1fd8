import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { ArtifactNotFoundError } from "../core/errors.js";
import { prettySize } from "../core/format.js";
import type { BlobstoreClient } from "../blobstore/types.js";
import { ArtifactLocator, type LocatedArtifact } from "./artifactLocator.js";
import { artifactDirName, loadReleaseManifest, type ArtifactDescriptor, type ArtifactKind, type ReleaseManifest } from "./manifest.js";
import { artifactLine, StreamReporter, type CompileReporter } from "./reporter.js";
import { defaultTarballPath } from "./releaseLayout.js";
import { createReleaseTarball } from "./tarball.js";

export const RELEASE_MANIFEST_FILE = "release.MF";

export interface ReleaseCompilerOptions {
  manifestPath: string;
  blobstore: BlobstoreClient;
  /** Root holding .final_builds/ and .dev_builds/; defaults to the working directory. */
  releaseDir?: string;
  /** Checksums (sha1 or fingerprint) of packages the destination already has. */
  packageMatches?: Iterable<string>;
  tarballPath?: string;
  reporter?: CompileReporter;
  tmpDir?: string;
}

export type ArtifactOutcome =
  | { status: "skipped"; descriptor: ArtifactDescriptor }
  | { status: "copied"; descriptor: ArtifactDescriptor; located: LocatedArtifact };

export type CompileResult =
  | { status: "already_built"; tarballPath: string }
  | {
      status: "built";
      tarballPath: string;
      sizeBytes: number;
      packages: ArtifactOutcome[];
      jobs: ArtifactOutcome[];
    };

async function copyPreserving(src: string, dest: string): Promise<void> {
  await fs.copyFile(src, dest);
  const st = await fs.stat(src);
  await fs.chmod(dest, st.mode & 0o7777);
  await fs.utimes(dest, st.atime, st.mtime);
}

/**
 * Builds `<name>-<version>.tgz` for one release manifest. The staging
 * directory is created by `create()` and belongs to this instance until
 * `dispose()`.
 */
export class ReleaseCompiler {
  readonly locator: ArtifactLocator;
  readonly tarballPath: string;
  private readonly packageMatches: ReadonlySet<string>;
  private readonly reporter: CompileReporter;

  private constructor(
    readonly manifest: ReleaseManifest,
    readonly manifestPath: string,
    readonly releaseDir: string,
    readonly buildDir: string,
    opts: ReleaseCompilerOptions
  ) {
    this.locator = new ArtifactLocator({ releaseDir, blobstore: opts.blobstore });
    this.tarballPath = opts.tarballPath
      ? path.resolve(releaseDir, opts.tarballPath)
      : defaultTarballPath(manifestPath, manifest.name, manifest.version);
    this.packageMatches = new Set(opts.packageMatches ?? []);
    this.reporter = opts.reporter ?? new StreamReporter();
  }

  static async create(opts: ReleaseCompilerOptions): Promise<ReleaseCompiler> {
    const releaseDir = path.resolve(opts.releaseDir ?? process.cwd());
    const manifestPath = path.resolve(releaseDir, opts.manifestPath);
    const manifest = await loadReleaseManifest(manifestPath);

    const buildDir = await fs.mkdtemp(path.join(opts.tmpDir ?? os.tmpdir(), "release-build-"));
    await fs.mkdir(path.join(buildDir, artifactDirName("job")), { recursive: true });
    await fs.mkdir(path.join(buildDir, artifactDirName("package")), { recursive: true });

    return new ReleaseCompiler(manifest, manifestPath, releaseDir, buildDir, opts);
  }

  /** Re-checked on every call. */
  async exists(): Promise<boolean> {
    try {
      await fs.stat(this.tarballPath);
      return true;
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
      throw err;
    }
  }

  remotePackageExists(pkg: ArtifactDescriptor): boolean {
    if (this.packageMatches.has(pkg.sha1)) return true;
    return pkg.fingerprint !== undefined && this.packageMatches.has(pkg.fingerprint);
  }

  // Jobs are never matched against the destination's inventory; only packages are.
  remoteJobExists(_job: ArtifactDescriptor): boolean {
    return false;
  }

  async compile(): Promise<CompileResult> {
    if (await this.exists()) {
      this.reporter.say(`You already have this version in \`${this.tarballPath}'`);
      return { status: "already_built", tarballPath: this.tarballPath };
    }

    await copyPreserving(this.manifestPath, path.join(this.buildDir, RELEASE_MANIFEST_FILE));

    this.reporter.header("Copying packages");
    const packages = await this.copyArtifacts("package", this.manifest.packages, (p) => this.remotePackageExists(p));

    this.reporter.header("Copying jobs");
    const jobs = await this.copyArtifacts("job", this.manifest.jobs, (j) => this.remoteJobExists(j));

    this.reporter.header("Building tarball");
    const { sizeBytes } = await createReleaseTarball({ sourceDir: this.buildDir, outPath: this.tarballPath });
    this.reporter.say(`Generated ${this.tarballPath}`);
    this.reporter.say(`Release size: ${prettySize(sizeBytes)}`);

    return { status: "built", tarballPath: this.tarballPath, sizeBytes, packages, jobs };
  }

  private async copyArtifacts(
    kind: ArtifactKind,
    descriptors: readonly ArtifactDescriptor[],
    knownRemotely: (d: ArtifactDescriptor) => boolean
  ): Promise<ArtifactOutcome[]> {
    const destDir = path.join(this.buildDir, artifactDirName(kind));
    const outcomes: ArtifactOutcome[] = [];

    for (const descriptor of descriptors) {
      if (knownRemotely(descriptor)) {
        this.reporter.say(artifactLine(descriptor, "SKIP"));
        outcomes.push({ status: "skipped", descriptor });
        continue;
      }

      let located: LocatedArtifact;
      try {
        located = await this.locator.locate(kind, descriptor);
      } catch (err) {
        if (err instanceof ArtifactNotFoundError) this.reporter.say(artifactLine(descriptor, "MISSING"));
        throw err;
      }

      await copyPreserving(located.path, path.join(destDir, `${descriptor.name}.tgz`));
      this.reporter.say(artifactLine(descriptor, located.source === "cache" ? "FOUND LOCAL" : "DOWNLOADED"));
      outcomes.push({ status: "copied", descriptor, located });
    }
    return outcomes;
  }

  async dispose(): Promise<void> {
    await fs.rm(this.buildDir, { recursive: true, force: true });
  }
}

/** Creates a compiler, compiles, and removes the staging directory whatever the outcome. */
export async function compileRelease(opts: ReleaseCompilerOptions): Promise<CompileResult> {
  const compiler = await ReleaseCompiler.create(opts);
  try {
    return await compiler.compile();
  } finally {
    await compiler.dispose();
  }
}
