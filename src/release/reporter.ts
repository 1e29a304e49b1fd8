import type { ArtifactDescriptor } from "./manifest.js";

export type ArtifactLineOutcome = "SKIP" | "FOUND LOCAL" | "DOWNLOADED" | "MISSING";

export interface CompileReporter {
  header(title: string): void;
  say(line: string): void;
}

export function artifactLine(descriptor: Pick<ArtifactDescriptor, "name" | "version">, outcome: ArtifactLineOutcome): string {
  return `${`${descriptor.name} (${descriptor.version})`.padEnd(30)} ${outcome}`;
}

export class StreamReporter implements CompileReporter {
  constructor(private readonly out: NodeJS.WritableStream = process.stdout) {}

  header(title: string): void {
    this.out.write(`\n${title}\n\n`);
  }

  say(line: string): void {
    this.out.write(`${line}\n`);
  }
}
