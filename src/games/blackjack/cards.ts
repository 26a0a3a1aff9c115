import type { Card } from './types.js';

export const ACE = 'Ace';

export type RankSpec = readonly [rank: string, value: number];

export const STANDARD_SUITS = ['Hearts', 'Spades', 'Clubs', 'Diamonds'] as const;

export const STANDARD_RANKS: readonly RankSpec[] = [
  ['2', 2], ['3', 3], ['4', 4], ['5', 5], ['6', 6], ['7', 7], ['8', 8], ['9', 9],
  ['10', 10], ['Jack', 10], ['Queen', 10], ['King', 10], [ACE, 11],
];

export function generateDeck(
  suits: readonly string[] = STANDARD_SUITS,
  ranks: readonly RankSpec[] = STANDARD_RANKS,
): Card[] {
  const cards: Card[] = [];
  for (const suit of suits) {
    for (const [rank, value] of ranks) {
      // index suffix keeps ids unique when a preset repeats a rank label
      cards.push({ id: `${rank}-${suit}-${cards.length}`, suit, rank, value });
    }
  }
  return cards;
}

/** Card identity as the table sees it: suit and rank, not the physical card. */
export function sameCard(a: Card, b: Card): boolean {
  return a.suit === b.suit && a.rank === b.rank;
}

/**
 * Best total not above 21 where possible: every Ace starts at 11 and is
 * dropped to 1, one at a time, while the hand would bust.
 */
export function handValue(cards: readonly Card[]): number {
  let total = 0;
  let aces = 0;
  for (const c of cards) {
    total += c.value;
    if (c.rank === ACE) aces++;
  }
  while (total > 21 && aces > 0) {
    total -= 10;
    aces--;
  }
  return total;
}

export function isNatural(cards: readonly Card[]): boolean {
  return cards.length === 2 && handValue(cards) === 21;
}

export function sameRank(a: Card, b: Card): boolean {
  return a.rank === b.rank;
}

export function sameValue(a: Card, b: Card): boolean {
  return a.value === b.value;
}

export function formatCard(card: Card): string {
  return `${card.rank} of ${card.suit}`;
}

export function formatCards(cards: readonly Card[]): string {
  return cards.map(formatCard).join(', ');
}
