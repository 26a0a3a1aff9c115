import type { Logger } from 'pino';
import { RNG, cryptoRNG } from '../../util/rng.js';
import { RoundError, normalizeError } from '../../utils/errors.js';
import { sameValue } from './cards.js';
import { RoundEngine } from './engine.js';
import type { Agent, Card, RoundObserver, RoundResult, SplitRule } from './types.js';

export interface BatchOptions {
  agent: Agent;
  deck: readonly Card[];
  rounds: number;
  splitRule?: SplitRule;
  rng?: RNG;
  observer?: RoundObserver;
  logger?: Logger;
  /** Offset added to round numbers in logs and failures (parallel chunks). */
  firstRound?: number;
  onRound?: (round: number, result: RoundResult) => void;
}

export interface RoundFailure {
  round: number;
  error: string;
  message: string;
}

export interface BatchResult {
  rewards: number[];
  failures: RoundFailure[];
  average: number;
}

export function average(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((acc, v) => acc + v, 0) / values.length;
}

/**
 * Plays `rounds` fresh rounds. A round that fails with a RoundError is left
 * out of the rewards and the average and reported in `failures`.
 */
export function runBatch(opts: BatchOptions): BatchResult {
  const engine = new RoundEngine(opts.deck, opts.agent, {
    splitRule: opts.splitRule ?? sameValue,
    rng: opts.rng ?? cryptoRNG,
    observer: opts.observer,
  });
  const offset = opts.firstRound ?? 0;
  const rewards: number[] = [];
  const failures: RoundFailure[] = [];
  for (let i = 0; i < opts.rounds; i++) {
    const round = offset + i + 1;
    try {
      const result = engine.playFreshRound();
      rewards.push(result.reward);
      opts.onRound?.(round, result);
    } catch (err) {
      if (!(err instanceof RoundError)) throw err;
      const info = normalizeError(err);
      failures.push({ round, error: info.name, message: info.message });
      opts.logger?.warn({ msg: 'round_failed', round, error: info.name, detail: info.message });
    }
  }
  return { rewards, failures, average: average(rewards) };
}

export function mergeResults(parts: readonly BatchResult[]): BatchResult {
  const rewards = parts.flatMap((p) => p.rewards);
  const failures = parts.flatMap((p) => p.failures);
  return { rewards, failures, average: average(rewards) };
}
