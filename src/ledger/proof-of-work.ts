import { createHash, type Hash } from 'crypto';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { difficultyTarget, type MiningPayload } from './block.js';

export type SearchOutcome =
  | { status: 'found'; nonce: number; hash: string; attempts: number }
  | { status: 'exhausted'; attempts: number }
  | { status: 'cancelled'; nextNonce: number; attempts: number };

export interface SearchOptions {
  // Inclusive ceiling; null searches without one
  maxNonce?: number | null;
  // Nonces tried between cancellation checks
  checkInterval?: number;
  signal?: AbortSignal;
}

type ChunkResult =
  | { found: true; nonce: number; hash: string }
  | { found: false; nextNonce: number };

/**
 * Try `count` consecutive nonces starting at `startNonce`. The hash state of
 * the payload prefix is computed once and copied per nonce.
 */
export function searchChunk(prefix: Hash, target: string, startNonce: number, count: number): ChunkResult {
  for (let nonce = startNonce; nonce < startNonce + count; nonce++) {
    const hash = prefix.copy().update(String(nonce)).digest('hex');
    if (hash.startsWith(target)) {
      return { found: true, nonce, hash };
    }
  }
  return { found: false, nextNonce: startNonce + count };
}

/**
 * Find the lowest nonce whose `SHA-256(payload || nonce)` hex digest starts
 * with `difficulty` zeros. Nonces are tried in increasing order from 0; the
 * loop yields to the event loop every `checkInterval` nonces so the signal can
 * stop it.
 */
export async function searchProof(
  payload: MiningPayload,
  difficulty: number,
  options: SearchOptions = {}
): Promise<SearchOutcome> {
  const target = difficultyTarget(difficulty);
  const checkInterval = Math.max(1, options.checkInterval ?? 10000);
  const maxNonce = options.maxNonce ?? null;
  const prefix = createHash('sha256').update(payload.toString());

  let nonce = 0;
  while (maxNonce === null || nonce <= maxNonce) {
    if (options.signal?.aborted) {
      return { status: 'cancelled', nextNonce: nonce, attempts: nonce };
    }

    const count = maxNonce === null ? checkInterval : Math.min(checkInterval, maxNonce - nonce + 1);
    const result = searchChunk(prefix, target, nonce, count);
    if (result.found) {
      return { status: 'found', nonce: result.nonce, hash: result.hash, attempts: result.nonce + 1 };
    }
    nonce = result.nextNonce;

    await yieldToEventLoop();
  }

  return { status: 'exhausted', attempts: nonce };
}
