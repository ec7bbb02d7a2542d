import { getRandomValues, randomUUID } from "node:crypto";

const SHORT_ID_CHARS = "abcdefghijklmnopqrstuvwxyz0123456789";

export function generateShortId(length = 6): string {
  let result = "";
  const randomBytes = getRandomValues(new Uint8Array(length));
  for (const byte of randomBytes) {
    result += SHORT_ID_CHARS[byte % SHORT_ID_CHARS.length];
  }
  return result;
}

export function generateUUID(): string {
  return randomUUID();
}
