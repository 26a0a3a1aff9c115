import { describe, expect, jest, test } from '@jest/globals';
import { ShoeExhaustedError } from '../../../utils/errors.js';
import { mulberry32 } from '../../../util/rng.js';
import { RolloutAgent } from '../agents.js';
import { STANDARD_SUITS, generateDeck } from '../cards.js';
import { RoundEngine } from '../engine.js';
import { SearchAgent } from '../searchAgent.js';
import { Shoe } from '../shoe.js';
import { card, from, hearts } from './fixtures.js';

const deck = generateDeck();
const pick = (rank: string, suit = 'Hearts') => from(deck, rank, suit);

describe('search agent', () => {
  test('a single legal action comes back whatever the shoe holds', () => {
    const agent = new SearchAgent([], { trials: 50, rng: mulberry32(1) });
    expect(agent.decide([pick('9'), pick('7')], ['STAND'], pick('6', 'Spades'))).toBe('STAND');
    expect(agent.currentBet).toBe(2);
  });

  test('mirrors the engine when it doubles down, until reset', () => {
    const agent = new SearchAgent([], { trials: 50, rng: mulberry32(1) });
    expect(agent.decide([pick('5'), pick('6')], ['DOUBLE_DOWN'], pick('6', 'Spades'))).toBe('DOUBLE_DOWN');
    expect(agent.currentBet).toBe(4);
    agent.reset();
    expect(agent.currentBet).toBe(2);
  });

  test('stands on hard 20 against a dealer 6', () => {
    const agent = new SearchAgent(deck, { trials: 300, rng: mulberry32(42) });
    const hand = [pick('10'), pick('King', 'Spades')];
    const action = agent.decide(hand, ['HIT', 'STAND', 'DOUBLE_DOWN'], pick('6', 'Clubs'));
    expect(action).toBe('STAND');
    expect(agent.currentBet).toBe(2);
    expect(hand).toHaveLength(2);
  });

  test('each trial replays the selected line before playing on at random', () => {
    // only ten-valued cards left: the dealer ends on 20 and any draw to 11 makes 21
    const tens = generateDeck(STANDARD_SUITS, [['10', 10], ['Jack', 10], ['Queen', 10], ['King', 10]]);
    const queued = jest.spyOn(RolloutAgent.prototype, 'queue');
    try {
      const agent = new SearchAgent(tens, { trials: 60, rng: mulberry32(3) });
      const action = agent.decide([card('5', 5), card('6', 6)], ['HIT', 'STAND', 'DOUBLE_DOWN'], tens[0]);
      expect(action).toBe('DOUBLE_DOWN');
      expect(agent.currentBet).toBe(4);
      expect(queued).toHaveBeenCalledTimes(60);
      expect(queued.mock.calls.slice(0, 3)).toEqual([['HIT'], ['STAND'], ['DOUBLE_DOWN']]);
    } finally {
      queued.mockRestore();
    }
  });

  test('unseen pool leaves out the hand and the upcard', () => {
    const small = hearts.slice(0, 3);
    const agent = new SearchAgent(small, { trials: 5, rng: mulberry32(1) });
    expect(() => agent.decide([small[0], small[1]], ['HIT', 'STAND'], small[2])).toThrow(ShoeExhaustedError);
  });

  test('throws when offered nothing', () => {
    const agent = new SearchAgent(deck, { trials: 5 });
    expect(() => agent.decide([pick('2'), pick('3')], [], pick('4'))).toThrow('SearchAgent needs at least one legal action');
  });

  test('plays whole rounds through the engine', () => {
    const agent = new SearchAgent(deck, { trials: 40, rng: mulberry32(5) });
    const engine = new RoundEngine(deck, agent, { rng: mulberry32(6) });
    for (let i = 0; i < 3; i++) {
      const result = engine.playFreshRound();
      expect(result.hands.length).toBeGreaterThanOrEqual(1);
      expect(Number.isFinite(result.reward)).toBe(true);
    }
  });

  test('starts every fresh round from the base bet', () => {
    const agent = new SearchAgent(deck, { trials: 1 });
    agent.decide([pick('5'), pick('6')], ['DOUBLE_DOWN'], pick('6', 'Spades'));
    const engine = new RoundEngine(deck, agent, {
      shoeFactory: () => Shoe.stacked([pick('Ace'), pick('10', 'Spades'), pick('King'), pick('7', 'Spades')]),
    });
    engine.playFreshRound();
    expect(agent.currentBet).toBe(2);
  });
});
