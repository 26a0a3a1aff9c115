import { RNG, cryptoRNG, shuffle } from '../../util/rng.js';
import { ShoeExhaustedError } from '../../utils/errors.js';
import { sameCard } from './cards.js';
import type { Card } from './types.js';

export class Shoe {
  private readonly cards: Card[];
  private next = 0;

  constructor(cards: readonly Card[], rng: RNG = cryptoRNG, shuffled = true) {
    this.cards = shuffled ? shuffle(cards, rng) : cards.slice();
  }

  /** Shoe dealt in exactly the given order. */
  static stacked(cards: readonly Card[]): Shoe {
    return new Shoe(cards, cryptoRNG, false);
  }

  get remaining(): number {
    return this.cards.length - this.next;
  }

  draw(): Card {
    if (this.next >= this.cards.length) throw new ShoeExhaustedError(this.next);
    return this.cards[this.next++];
  }
}

/**
 * Deck minus the cards already seen. A seen card is matched by id when the
 * deck holds that id, otherwise the first card with the same suit and rank goes.
 */
export function withoutCards(deck: readonly Card[], seen: readonly Card[]): Card[] {
  const rest = deck.slice();
  for (const card of seen) {
    let idx = rest.findIndex((c) => c.id === card.id);
    if (idx === -1) idx = rest.findIndex((c) => sameCard(c, card));
    if (idx !== -1) rest.splice(idx, 1);
  }
  return rest;
}
