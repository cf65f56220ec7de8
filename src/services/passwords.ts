import bcrypt from "bcryptjs";
import crypto from "crypto";

const LEGACY_SHA256_RE = /^[0-9a-f]{64}$/;

export function hashPassword(password: string, rounds: number): Promise<string> {
  return bcrypt.hash(password, rounds);
}

/**
 * Accounts imported from the first version of the tracker carry an unsalted
 * SHA-256 hex digest. Those still verify; the caller should rehash on success.
 */
export function isLegacyHash(stored: string): boolean {
  return LEGACY_SHA256_RE.test(stored);
}

export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  if (isLegacyHash(stored)) {
    const digest = Buffer.from(crypto.createHash("sha256").update(password).digest("hex"));
    const expected = Buffer.from(stored);
    return digest.length === expected.length && crypto.timingSafeEqual(digest, expected);
  }
  return bcrypt.compare(password, stored);
}
