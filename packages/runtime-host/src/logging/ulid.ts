/**
 * hpikit Runtime Host: ULID
 *
 * 26-character Crockford Base32 identifiers: 48 bits of millisecond time
 * followed by 80 random bits. Identifiers from one generator sort in
 * creation order, even within a single millisecond: the random part is
 * incremented instead of redrawn while the clock stands still.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

const ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const TIME_CHARS = 10;
const RANDOM_CHARS = 16;
const RANDOM_MAX = (1n << 80n) - 1n;

function encode(value: bigint, length: number): string {
  let out = '';
  let rest = value;
  for (let i = 0; i < length; i++) {
    out = ALPHABET.charAt(Number(rest & 31n)) + out;
    rest >>= 5n;
  }
  return out;
}

function randomPart(): bigint {
  return BigInt('0x' + randomBytes(10).toString('hex'));
}

export type UlidFactory = () => string;

/**
 * A monotonic ULID generator.
 *
 * @param now - Millisecond clock; injectable for tests
 */
export function monotonicUlid(now: () => number = Date.now): UlidFactory {
  let lastTime = -1;
  let lastRandom = 0n;
  return () => {
    const time = now();
    if (time <= lastTime && lastRandom < RANDOM_MAX) {
      lastRandom += 1n;
    } else {
      lastTime = Math.max(time, lastTime);
      lastRandom = randomPart();
    }
    return encode(BigInt(lastTime), TIME_CHARS) + encode(lastRandom, RANDOM_CHARS);
  };
}

export const ulid: UlidFactory = monotonicUlid();
