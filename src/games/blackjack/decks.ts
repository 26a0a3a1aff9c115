import { RNG, shuffle } from '../../util/rng.js';
import { ACE, RankSpec, STANDARD_RANKS, generateDeck } from './cards.js';
import type { Card } from './types.js';

export type DeckPreset = (rng: RNG) => Card[];

// Presets may use made-up ranks and values; only rank "Ace" gets the soft/hard treatment.
export const DECK_PRESETS: Readonly<Record<string, DeckPreset>> = {
  default: () => generateDeck(),
  high: () => generateDeck(undefined, [['2', 2], ['10', 10], [ACE, 11], ['Fool', 12]]),
  low: () =>
    generateDeck(
      ['Hearts', 'Spades', 'Clubs', 'Diamonds', 'Swords', 'Wands', 'Bows'],
      [['1.5', 1.5], ['2', 2], ['2.2', 2.2], ['3', 3], ['3', 4], [ACE, 11]],
    ),
  even: () =>
    generateDeck(undefined, STANDARD_RANKS.filter(([, value]) => value % 2 === 0)),
  odd: () => generateDeck(undefined, STANDARD_RANKS.filter(([, value]) => value % 2 === 1)),
  red: () => generateDeck(['Diamonds', 'Hearts']),
  random: (rng) => generateDeck(undefined, randomRanks(rng)),
};

/** Between 5 and 13 of the standard ranks, in random order. */
function randomRanks(rng: RNG): RankSpec[] {
  const count = 5 + rng(STANDARD_RANKS.length - 5 + 1);
  return shuffle(STANDARD_RANKS, rng).slice(0, count);
}
