import { createHash, randomBytes } from "node:crypto";
import { createReadStream } from "node:fs";

/** Read size for streaming digests */
export const CHECKSUM_BLOCK_SIZE = 4096;

/**
 * SHA-256 of a file, read in fixed-size blocks.
 */
export async function computeFileChecksum(filePath: string): Promise<string> {
  const hash = createHash("sha256");
  const stream = createReadStream(filePath, { highWaterMark: CHECKSUM_BLOCK_SIZE });

  for await (const chunk of stream) {
    hash.update(chunk);
  }

  return hash.digest("hex");
}

/**
 * Recompute and compare. A missing or unreadable file counts as a mismatch.
 */
export async function verifyFileChecksum(filePath: string, expected: string): Promise<boolean> {
  try {
    const actual = await computeFileChecksum(filePath);
    return actual === expected.toLowerCase();
  } catch {
    return false;
  }
}

export function generateShortId(): string {
  const chars = "abcdefghijklmnopqrstuvwxyz0123456789";
  let result = "";
  for (const byte of randomBytes(6)) {
    result += chars[byte % chars.length];
  }
  return result;
}
