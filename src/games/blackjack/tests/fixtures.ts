import { generateDeck } from '../cards.js';
import type { Action, Agent, Card } from '../types.js';

/** Loose card for settlement checks; suit and id do not matter there. */
export function card(rank: string, value: number, suit = 'Hearts'): Card {
  return { id: `${rank}-${suit}`, suit, rank, value };
}

/** Finds one card of a generated deck by rank and suit. */
export function from(deck: readonly Card[], rank: string, suit = 'Hearts'): Card {
  const found = deck.find((c) => c.rank === rank && c.suit === suit);
  if (!found) throw new Error(`no ${rank} of ${suit} in deck`);
  return found;
}

export const hearts = generateDeck(['Hearts']);
export const twoSuits = generateDeck(['Hearts', 'Spades']);
export const threeSuits = generateDeck(['Hearts', 'Spades', 'Clubs']);

/** Replies from a script, then stands; keeps every legal set it was offered. */
export class ScriptAgent implements Agent {
  readonly name = 'Script';
  readonly offered: Action[][] = [];
  private readonly script: Action[];

  constructor(...script: Action[]) {
    this.script = script;
  }

  decide(_hand: readonly Card[], legal: readonly Action[]): Action {
    this.offered.push(legal.slice());
    return this.script.shift() ?? 'STAND';
  }
}
