import type { ArtifactKind } from "../release/manifest.js";

export class ReleaseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ReleaseError";
  }
}

export class InvalidManifestError extends ReleaseError {
  constructor(
    readonly manifestPath: string,
    readonly issues: string[]
  ) {
    super(`invalid release manifest at ${manifestPath}: ${issues.join("; ")}`);
    this.name = "InvalidManifestError";
  }
}

export class InvalidArtifactNameError extends ReleaseError {
  constructor(readonly artifactName: string) {
    super(`unsafe artifact name: ${JSON.stringify(artifactName)}`);
    this.name = "InvalidArtifactNameError";
  }
}

export class InvalidVersionIndexError extends ReleaseError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidVersionIndexError";
  }
}

export class InvalidReleaseConfigError extends ReleaseError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidReleaseConfigError";
  }
}

export class ArtifactNotFoundError extends ReleaseError {
  constructor(
    readonly kind: ArtifactKind,
    readonly artifactName: string,
    readonly artifactVersion: string,
    readonly sha1: string
  ) {
    super(`Cannot find ${kind} with checksum \`${sha1}'`);
    this.name = "ArtifactNotFoundError";
  }
}

/** Bytes (fetched or cached) whose SHA-1 differs from the one the version index promised. */
export class ChecksumMismatchError extends ReleaseError {
  constructor(
    readonly subject: string,
    readonly expected: string,
    readonly actual: string
  ) {
    super(`${subject} checksum mismatch (expected ${expected}, got ${actual})`);
    this.name = "ChecksumMismatchError";
  }
}

export class BlobstoreError extends ReleaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BlobstoreError";
  }
}

export class ArchiveCreationFailedError extends ReleaseError {
  constructor(readonly output: string) {
    super(`Cannot create release tarball: ${output}`);
    this.name = "ArchiveCreationFailedError";
  }
}
