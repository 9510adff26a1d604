import { randomBytes } from "crypto";

/**
 * Generates a UUIDv7 (RFC 9562): 48-bit millisecond timestamp, version 7,
 * variant 10, random remainder.
 *
 * Time-ordered ids keep inserts append-only in the primary key index and let
 * rows be listed in creation order without a separate column.
 */
export function generateUuidv7(now: number = Date.now()): string {
  const bytes = randomBytes(16);

  bytes.writeUIntBE(now, 0, 6);
  bytes[6] = (bytes[6] & 0x0f) | 0x70;
  bytes[8] = (bytes[8] & 0x3f) | 0x80;

  const hex = bytes.toString("hex");
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

/**
 * Reads the creation time back out of a UUIDv7.
 */
export function uuidv7Timestamp(id: string): Date {
  return new Date(parseInt(id.replace(/-/g, "").slice(0, 12), 16));
}
