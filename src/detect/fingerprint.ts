import crypto from "node:crypto";
import fs from "node:fs";

/** Lowercase hex SHA-256 of the payload, 64 characters. */
export function computeFingerprint(bytes: Uint8Array): string {
  return crypto.createHash("sha256").update(bytes).digest("hex");
}

export async function fingerprintFile(filePath: string): Promise<string> {
  return computeFingerprint(await fs.promises.readFile(filePath));
}
