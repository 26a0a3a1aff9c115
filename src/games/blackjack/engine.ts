import { RNG, cryptoRNG } from '../../util/rng.js';
import { handValue, isNatural, sameValue } from './cards.js';
import { DealerAgent } from './agents.js';
import { Shoe } from './shoe.js';
import type {
  Action,
  Agent,
  Card,
  HandOutcome,
  Participant,
  RoundObserver,
  RoundResult,
  SplitRule,
} from './types.js';

export const INITIAL_BET = 2;

export interface EngineOptions {
  splitRule?: SplitRule;
  rng?: RNG;
  observer?: RoundObserver;
  /** Builds the shoe for each round; defaults to a fresh shuffle of the deck. */
  shoeFactory?: (deck: readonly Card[]) => Shoe;
}

interface RoundState {
  shoe: Shoe;
  bet: number;
  dealer: Card[];
}

export class RoundEngine {
  private readonly dealerAgent = new DealerAgent();
  private readonly splitRule: SplitRule;
  private readonly observer: RoundObserver;
  private readonly shoeFactory: (deck: readonly Card[]) => Shoe;

  constructor(
    private readonly deck: readonly Card[],
    private readonly agent: Agent,
    opts: EngineOptions = {},
  ) {
    const rng = opts.rng ?? cryptoRNG;
    this.splitRule = opts.splitRule ?? sameValue;
    this.observer = opts.observer ?? {};
    this.shoeFactory = opts.shoeFactory ?? ((cards) => new Shoe(cards, rng));
  }

  playFreshRound(): RoundResult {
    this.agent.reset?.();
    const state: RoundState = { shoe: this.shoeFactory(this.deck), bet: INITIAL_BET, dealer: [] };
    const player: Card[] = [];
    for (let i = 0; i < 2; i++) {
      this.deal(state, player, 'player');
      this.deal(state, state.dealer, 'dealer', i < 1);
    }
    return this.playRound(state, player);
  }

  /**
   * Finish a partially played round. The deck this engine was built with must
   * already exclude `playerHand` and `dealerVisible`; nothing checks for
   * cards dealt twice.
   */
  resumeRound(playerHand: readonly Card[], dealerVisible: readonly Card[], bet: number): RoundResult {
    const state: RoundState = { shoe: this.shoeFactory(this.deck), bet, dealer: dealerVisible.slice() };
    while (state.dealer.length < 2) this.deal(state, state.dealer, 'dealer', false);
    return this.playRound(state, playerHand.slice());
  }

  private playRound(state: RoundState, player: Card[]): RoundResult {
    const finals = this.playHand(state, this.agent, 'player', player, true);
    this.observer.dealerReveal?.(state.dealer);
    this.playHand(state, this.dealerAgent, 'dealer', state.dealer, true);
    const hands: HandOutcome[] = finals.map((cards) => ({
      cards,
      value: handValue(cards),
      reward: settleHand(cards, state.dealer, state.bet),
    }));
    const result: RoundResult = {
      reward: hands.reduce((acc, h) => acc + h.reward, 0),
      bet: state.bet,
      hands,
      dealer: state.dealer,
    };
    this.observer.settle?.(result);
    return result;
  }

  private playHand(
    state: RoundState,
    agent: Agent,
    who: Participant,
    cards: Card[],
    canSplit: boolean,
    label = '',
  ): Card[][] {
    while (handValue(cards) < 21) {
      const legal = this.legalActions(cards, canSplit);
      const act = agent.decide(cards, legal, state.dealer[0]);
      if (!legal.includes(act)) continue;
      this.observer.action?.(who, act);
      if (act === 'STAND') break;
      if (act === 'HIT') {
        this.deal(state, cards, who);
        continue;
      }
      if (act === 'DOUBLE_DOWN') {
        this.deal(state, cards, who);
        state.bet *= 2;
        break;
      }
      const children = [cards.slice(0, 1), cards.slice(1)];
      this.observer.split?.(who, children);
      this.playHand(state, agent, who, children[0], false, 'hand 1');
      this.playHand(state, agent, who, children[1], false, 'hand 2');
      return children;
    }
    this.observer.handEnd?.(who, cards, label);
    return [cards];
  }

  legalActions(cards: readonly Card[], canSplit: boolean): Action[] {
    const actions: Action[] = ['HIT', 'STAND', 'DOUBLE_DOWN'];
    if (cards.length === 2 && canSplit && this.splitRule(cards[0], cards[1])) actions.push('SPLIT');
    return actions;
  }

  private deal(state: RoundState, cards: Card[], who: Participant, visible = true): void {
    const card = state.shoe.draw();
    cards.push(card);
    this.observer.draw?.(who, card, visible);
  }
}

/**
 * Net reward of one finished player hand. The win check runs before the
 * push check, so a natural 21 that ties the dealer is neither paid nor pushed.
 */
export function settleHand(player: readonly Card[], dealer: readonly Card[], bet: number): number {
  const pscore = handValue(player);
  const dscore = handValue(dealer);
  if (pscore > 21) return -bet;
  let result = -bet;
  if (pscore > dscore || dscore > 21) {
    result = isNatural(player) ? (3 * bet) / 2 : bet;
  }
  if (pscore === dscore && !isNatural(player)) result = 0;
  return result;
}
