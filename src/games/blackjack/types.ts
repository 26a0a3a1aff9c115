export interface Card {
  readonly id: string;
  readonly suit: string;
  readonly rank: string;
  readonly value: number;
}

export type Hand = Card[];

export const ACTIONS = ['HIT', 'STAND', 'DOUBLE_DOWN', 'SPLIT'] as const;
export type Action = (typeof ACTIONS)[number];

export type SplitRule = (a: Card, b: Card) => boolean;

export interface Agent {
  readonly name: string;
  decide(hand: readonly Card[], legal: readonly Action[], dealerUpcard: Card): Action;
  /** Called by the engine before each fresh round. */
  reset?(): void;
}

export type Participant = 'player' | 'dealer';

export interface RoundObserver {
  draw?(who: Participant, card: Card, visible: boolean): void;
  action?(who: Participant, action: Action): void;
  split?(who: Participant, hands: readonly Card[][]): void;
  handEnd?(who: Participant, cards: readonly Card[], label: string): void;
  dealerReveal?(cards: readonly Card[]): void;
  settle?(result: RoundResult): void;
}

export interface HandOutcome {
  cards: Card[];
  value: number;
  reward: number;
}

export interface RoundResult {
  reward: number;
  bet: number;
  hands: HandOutcome[];
  dealer: Card[];
}
