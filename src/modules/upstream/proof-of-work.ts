import { createHash } from 'crypto';
import { ProofToken } from '../../common/interfaces';
import { USER_AGENT } from './upstream.constants';

/** Upper bound of the candidate search; overridden by POW_MAX_ITERATIONS. */
export const DEFAULT_MAX_ITERATIONS = 100000;

export const PROOF_TOKEN_PREFIX = 'gAAAAAB';

/**
 * Prefix of the token sent when the search gives up. The backend may or may
 * not accept it; callers treat it as a degraded credential.
 */
export const FALLBACK_TOKEN_PREFIX = 'gAAAAABwQ8Lk5FbGpA2NcR9dShT6gYjU7VxZ4D';

/** Fixed field of the candidate payload, mirrors what the web client sends. */
export const PAYLOAD_MAGIC = 4294705152;

export const PROOF_CONSTANT_RANGE = { min: 2000, max: 8000 } as const;

export interface ProofOfWorkInput {
  seed: string;
  difficulty: string;
  /** Per-process random value, see PROOF_CONSTANT_RANGE. */
  constant: number;
  maxIterations?: number;
  now?: Date;
}

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const pad2 = (n: number) => String(n).padStart(2, '0');

/** `Date.prototype.toString()` output of a browser running in UTC. */
export function formatProofTimestamp(date: Date): string {
  const time = `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())}`;
  return (
    `${WEEKDAYS[date.getUTCDay()]} ${MONTHS[date.getUTCMonth()]} ${pad2(date.getUTCDate())} ` +
    `${date.getUTCFullYear()} ${time} GMT+0000 (Coordinated Universal Time)`
  );
}

export function encodeCandidate(constant: number, timestamp: string, iteration: number): string {
  const payload = JSON.stringify([constant, timestamp, PAYLOAD_MAGIC, iteration, USER_AGENT]);
  return Buffer.from(payload, 'utf-8').toString('base64');
}

/** Hex of the first `floor(difficulty.length / 2)` bytes of SHA3-512(seed + candidate). */
export function hashPrefix(seed: string, candidate: string, difficulty: string): string {
  const prefixBytes = Math.floor(difficulty.length / 2);
  return createHash('sha3-512')
    .update(seed + candidate)
    .digest()
    .subarray(0, prefixBytes)
    .toString('hex');
}

export function fallbackToken(seed: string): string {
  return FALLBACK_TOKEN_PREFIX + Buffer.from(JSON.stringify(seed), 'utf-8').toString('base64');
}

export function solveProofOfWork(input: ProofOfWorkInput): ProofToken {
  const { seed, difficulty, constant } = input;
  const maxIterations = input.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const timestamp = formatProofTimestamp(input.now ?? new Date());

  for (let i = 0; i < maxIterations; i++) {
    const candidate = encodeCandidate(constant, timestamp, i);
    // lexicographic, not numeric
    if (hashPrefix(seed, candidate, difficulty) <= difficulty) {
      return { token: PROOF_TOKEN_PREFIX + candidate, degraded: false, attempts: i + 1 };
    }
  }

  return { token: fallbackToken(seed), degraded: true, attempts: maxIterations };
}
