import { RNG, cryptoRNG, pick } from '../../util/rng.js';
import { handValue } from './cards.js';
import type { Action, Agent, Card } from './types.js';

/** Picks uniformly among the legal actions. */
export class RandomAgent implements Agent {
  constructor(readonly name = 'Random', protected readonly rng: RNG = cryptoRNG) {}

  decide(_hand: readonly Card[], legal: readonly Action[], _dealerUpcard: Card): Action {
    return pick(legal, this.rng);
  }
}

/** Never takes another card. */
export class StandAgent implements Agent {
  constructor(readonly name = 'Timid') {}

  decide(): Action {
    return 'STAND';
  }
}

/**
 * A low dealer upcard busts more often, so stand early against it (hit under
 * 12); against 7 or higher keep hitting under 17.
 */
export class ThresholdAgent implements Agent {
  constructor(readonly name = 'Basic') {}

  decide(hand: readonly Card[], _legal: readonly Action[], dealerUpcard: Card): Action {
    const threshold = dealerUpcard.value < 7 ? 12 : 17;
    return handValue(hand) < threshold ? 'HIT' : 'STAND';
  }
}

/** House rule: hit below 17. */
export class DealerAgent implements Agent {
  readonly name = 'Dealer';

  decide(hand: readonly Card[]): Action {
    return handValue(hand) < 17 ? 'HIT' : 'STAND';
  }
}

/**
 * Plays queued actions first, then random ones. Every returned action is
 * recorded so a rollout can be traced back to the line it followed.
 */
export class RolloutAgent extends RandomAgent {
  private queued: Action[] = [];
  private actions: Action[] = [];

  constructor(rng: RNG = cryptoRNG) {
    super('Rollout', rng);
  }

  get history(): readonly Action[] {
    return this.actions;
  }

  queue(...actions: Action[]): void {
    this.queued.push(...actions);
  }

  override decide(hand: readonly Card[], legal: readonly Action[], dealerUpcard: Card): Action {
    const act = this.queued.shift() ?? super.decide(hand, legal, dealerUpcard);
    this.actions.push(act);
    return act;
  }

  reset(): void {
    this.queued = [];
    this.actions = [];
  }
}
