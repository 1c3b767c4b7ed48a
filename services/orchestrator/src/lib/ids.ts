import { randomBytes } from "crypto";

/**
 * URL- and header-safe random token of the given length
 */
export function createNonce(length = 16): string {
  return randomBytes(Math.ceil((length * 3) / 4))
    .toString("base64url")
    .slice(0, length);
}

const APPROVAL_ID_ALPHABET = "abcdefghjkmnpqrstuvwxyz23456789";

/**
 * Short id that is easy to type in chat (no 0/o, 1/l/i)
 */
export function createApprovalId(length = 8): string {
  const bytes = randomBytes(length);
  let id = "";
  for (const byte of bytes) {
    id += APPROVAL_ID_ALPHABET[byte % APPROVAL_ID_ALPHABET.length];
  }
  return id;
}

