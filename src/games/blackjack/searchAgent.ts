import type { Logger } from 'pino';
import { RNG, cryptoRNG } from '../../util/rng.js';
import { sameValue } from './cards.js';
import { RolloutAgent } from './agents.js';
import { INITIAL_BET, RoundEngine } from './engine.js';
import { SearchNode, backpropagate, bestAction, expand, score, selectChild } from './mcts.js';
import { withoutCards } from './shoe.js';
import type { Action, Agent, Card, SplitRule } from './types.js';

export const DEFAULT_TRIALS = 1000;

export interface SearchOptions {
  trials?: number;
  splitRule?: SplitRule;
  rng?: RNG;
  logger?: Logger;
}

/**
 * Tree search over action sequences. Each trial reshuffles the cards this
 * agent has not seen, replays the selected line through a rollout agent and
 * lets the round engine finish the hand at random. The dealer's hole card
 * stays in the unseen pool.
 */
export class SearchAgent implements Agent {
  readonly name: string;
  private bet = INITIAL_BET;
  private readonly trials: number;
  private readonly splitRule: SplitRule;
  private readonly rng: RNG;
  private readonly logger?: Logger;

  constructor(private readonly deck: readonly Card[], opts: SearchOptions = {}, name = 'Search') {
    this.name = name;
    this.trials = opts.trials ?? DEFAULT_TRIALS;
    this.splitRule = opts.splitRule ?? sameValue;
    this.rng = opts.rng ?? cryptoRNG;
    this.logger = opts.logger;
  }

  /** Stake the next decision simulates with. */
  get currentBet(): number {
    return this.bet;
  }

  decide(hand: readonly Card[], legal: readonly Action[], dealerUpcard: Card): Action {
    if (legal.length === 0) throw new Error('SearchAgent needs at least one legal action');
    if (legal.length === 1) return this.commit(legal[0]);

    const unseen = withoutCards(this.deck, [...hand, dealerUpcard]);
    const rollout = new RolloutAgent(this.rng);
    const sim = new RoundEngine(unseen, rollout, { splitRule: this.splitRule, rng: this.rng });

    const root = new SearchNode();
    expand(root, legal);
    for (let i = 0; i < this.trials; i++) {
      let selected = root;
      do {
        const next = selectChild(selected, i + 1);
        if (next === null) expand(selected, legal);
        else selected = next;
      } while (selected.visits > 0);

      rollout.reset();
      rollout.queue(...selected.actionPath);
      const { reward } = sim.resumeRound(hand, [dealerUpcard], this.bet);
      backpropagate(selected, reward);
    }

    const act = bestAction(root);
    if (this.logger?.isLevelEnabled('debug')) {
      this.logger.debug({
        msg: 'search_decision',
        action: act,
        trials: this.trials,
        scores: Object.fromEntries(root.children.map((c): [string, number] => [c.action ?? '', Number(score(c).toFixed(3))])),
      });
    }
    return this.commit(act);
  }

  reset(): void {
    this.bet = INITIAL_BET;
  }

  // The engine doubles the round bet on a double-down; later decisions in
  // the same round have to simulate with the doubled stake too.
  private commit(act: Action): Action {
    if (act === 'DOUBLE_DOWN') this.bet *= 2;
    return act;
  }
}
