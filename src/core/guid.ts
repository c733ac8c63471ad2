import { randomUUID } from "crypto";

/**
 * Returns a random RFC 4122 v4 identifier as 32 lowercase hex characters.
 */
export function createGuidWithoutDashes(): string {
  return randomUUID().replace(/-/g, "");
}

export function isGuidWithoutDashes(value: string): boolean {
  return /^[0-9a-f]{32}$/.test(value);
}
