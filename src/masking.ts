import { randomFillSync } from "node:crypto";

export const MASKING_KEY_LENGTH = 4;

/** Produces a fresh 4-byte masking key for each outbound frame. */
export type MaskingKeyGenerator = () => Uint8Array;

export const randomMaskingKey: MaskingKeyGenerator = () =>
  randomFillSync(new Uint8Array(MASKING_KEY_LENGTH));

/** Identity mask. Only useful for deterministic tests. */
export const nullMaskingKey: MaskingKeyGenerator = () =>
  new Uint8Array(MASKING_KEY_LENGTH);

/**
 * XOR `data` in place with `key`. `offset` is the position of `data[0]`
 * within the frame payload, so a payload can be (un)masked piecewise.
 */
export function applyMask(data: Uint8Array, key: Uint8Array, offset = 0): void {
  for (let i = 0; i < data.length; i++) {
    data[i] ^= key[(offset + i) & 3];
  }
}
