const UNITS = [
  { suffix: "G", bytes: 1024 ** 3 },
  { suffix: "M", bytes: 1024 ** 2 },
  { suffix: "K", bytes: 1024 }
] as const;

export function prettySize(sizeBytes: number): string {
  for (const unit of UNITS) {
    if (sizeBytes >= unit.bytes) return `${(sizeBytes / unit.bytes).toFixed(1)}${unit.suffix}`;
  }
  return `${sizeBytes}B`;
}
