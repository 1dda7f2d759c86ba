import { createHash } from "node:crypto"
import { factory } from "ulid"
import type { IdDeriver } from "../ports/id-generator"

const ULID_PATTERN = /^[0-7][0-9A-HJKMNP-TV-Z]{25}$/

/** Bytes of entropy a ULID carries after its 48-bit time component. */
export const ULID_ENTROPY_BYTES = 10

export function isUlid(value: unknown): value is string {
  return typeof value === "string" && ULID_PATTERN.test(value)
}

/**
 * Encodes `entropy` as the random part of a ULID whose time component is
 * zero, so the same bytes always give the same id.
 *
 * @throws RangeError when fewer than {@link ULID_ENTROPY_BYTES} bytes are given
 */
export function deterministicUlid(entropy: Uint8Array): string {
  if (entropy.length < ULID_ENTROPY_BYTES) {
    throw new RangeError(`ULID entropy needs ${ULID_ENTROPY_BYTES} bytes, got ${entropy.length}`)
  }

  let bits = 0n
  for (const byte of entropy.subarray(0, ULID_ENTROPY_BYTES)) {
    bits = (bits << 8n) | BigInt(byte)
  }

  // ulid builds the random part right to left, so the lowest quintet goes first
  let shift = 0n
  const prng = () => {
    const quintet = Number((bits >> shift) & 31n)
    shift += 5n
    return quintet / 32
  }

  return factory(prng)(0)
}

/**
 * ULID over the leading bytes of the SHA-256 of `seed`.
 */
export const hashedUlid: IdDeriver<string> = {
  derive: (seed) => deterministicUlid(createHash("sha256").update(seed, "utf8").digest()),
}
