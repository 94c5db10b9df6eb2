import { randomBytes } from "node:crypto";

/**
 * Return an unsigned 32-bit seed from the system CSPRNG.
 *
 * Used when a maze config omits its seed; the drawn value is written back into
 * the validated config so the maze can still be reproduced.
 */
export function randomSeed(): number {
  return randomBytes(4).readUInt32LE(0);
}
