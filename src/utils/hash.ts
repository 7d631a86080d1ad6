import { createHash } from "node:crypto";

export function sha256(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Stable hash of a path → content-hash manifest. Key order does not matter.
 */
export function manifestHash(manifest: ReadonlyMap<string, string>): string {
  const lines = [...manifest.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([path, hash]) => `${hash}  ${path}`);
  return sha256(lines.join("\n"));
}
