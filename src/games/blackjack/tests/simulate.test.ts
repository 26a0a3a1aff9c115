import { describe, expect, test } from '@jest/globals';
import { ShoeExhaustedError } from '../../../utils/errors.js';
import { mulberry32 } from '../../../util/rng.js';
import { StandAgent } from '../agents.js';
import { STANDARD_RANKS, STANDARD_SUITS, generateDeck } from '../cards.js';
import { average, mergeResults, runBatch } from '../simulate.js';
import type { Action, Agent } from '../types.js';
import { hearts } from './fixtures.js';

// no aces, so the player is always asked at least once
const noAces = generateDeck(STANDARD_SUITS, STANDARD_RANKS.filter(([rank]) => rank !== 'Ace'));

/** Stands, except on the rounds listed, where it fails the way a short shoe would. */
class FailingAgent implements Agent {
  readonly name = 'Failing';
  private round = 0;

  constructor(private readonly failOn: number[], private readonly error: () => Error = () => new ShoeExhaustedError(0)) {}

  reset(): void {
    this.round++;
  }

  decide(): Action {
    if (this.failOn.includes(this.round)) throw this.error();
    return 'STAND';
  }
}

describe('average', () => {
  test('mean of the rewards, 0 when empty', () => {
    expect(average([2, -2, 3])).toBe(1);
    expect(average([])).toBe(0);
  });
});

describe('runBatch', () => {
  test('same seed, same rewards', () => {
    const a = runBatch({ agent: new StandAgent(), deck: generateDeck(), rounds: 20, rng: mulberry32(8) });
    const b = runBatch({ agent: new StandAgent(), deck: generateDeck(), rounds: 20, rng: mulberry32(8) });
    expect(a.rewards).toHaveLength(20);
    expect(a).toEqual(b);
  });

  test('rewards are reported round by round', () => {
    const seen: number[] = [];
    const res = runBatch({
      agent: new StandAgent(),
      deck: generateDeck(),
      rounds: 4,
      rng: mulberry32(2),
      onRound: (round, result) => seen.push(round, result.reward),
    });
    expect(seen).toEqual([1, res.rewards[0], 2, res.rewards[1], 3, res.rewards[2], 4, res.rewards[3]]);
  });

  test('a failed round is left out of the average and reported', () => {
    const res = runBatch({ agent: new FailingAgent([2]), deck: noAces, rounds: 3, rng: mulberry32(4) });
    expect(res.rewards).toHaveLength(2);
    expect(res.average).toBe((res.rewards[0] + res.rewards[1]) / 2);
    expect(res.failures).toEqual([{ round: 2, error: 'ShoeExhaustedError', message: 'shoe exhausted after 0 cards' }]);
  });

  test('failure round numbers include the chunk offset', () => {
    const res = runBatch({ agent: new FailingAgent([1]), deck: noAces, rounds: 2, firstRound: 10, rng: mulberry32(4) });
    expect(res.failures.map((f) => f.round)).toEqual([11]);
  });

  test('a shoe too small to deal fails every round without aborting the batch', () => {
    const res = runBatch({ agent: new StandAgent(), deck: hearts.slice(0, 3), rounds: 3, rng: mulberry32(1) });
    expect(res.rewards).toEqual([]);
    expect(res.average).toBe(0);
    expect(res.failures.map((f) => f.round)).toEqual([1, 2, 3]);
  });

  test('other errors abort the batch', () => {
    const agent = new FailingAgent([1], () => new Error('boom'));
    expect(() => runBatch({ agent, deck: noAces, rounds: 3, rng: mulberry32(4) })).toThrow('boom');
  });
});

describe('mergeResults', () => {
  test('concatenates in order and recomputes the average', () => {
    const merged = mergeResults([
      { rewards: [2, 2], failures: [], average: 2 },
      { rewards: [-4], failures: [{ round: 3, error: 'ShoeExhaustedError', message: 'x' }], average: -4 },
    ]);
    expect(merged.rewards).toEqual([2, 2, -4]);
    expect(merged.average).toBe(0);
    expect(merged.failures).toHaveLength(1);
  });
});
