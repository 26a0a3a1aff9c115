import type { Logger } from 'pino';
import type { RNG } from '../../util/rng.js';
import { ConfigError } from '../../utils/errors.js';
import { RandomAgent, StandAgent, ThresholdAgent } from './agents.js';
import { DECK_PRESETS } from './decks.js';
import { SearchAgent } from './searchAgent.js';
import type { Agent, Card, SplitRule } from './types.js';

export const PLAYER_NAME = 'Sir Gladington III, Esq.';

export interface AgentContext {
  deck: readonly Card[];
  splitRule: SplitRule;
  rng: RNG;
  trials: number;
  logger?: Logger;
}

export type AgentFactory = (ctx: AgentContext) => Agent;

export const AGENT_FACTORIES: Readonly<Record<string, AgentFactory>> = {
  default: ({ rng }) => new RandomAgent(PLAYER_NAME, rng),
  timid: () => new StandAgent(PLAYER_NAME),
  basic: () => new ThresholdAgent(PLAYER_NAME),
  mcts: ({ deck, splitRule, rng, trials, logger }) =>
    new SearchAgent(deck, { trials, splitRule, rng, logger }, PLAYER_NAME),
};

function lookup<T>(kind: string, table: Readonly<Record<string, T>>, name: string): T {
  if (!Object.prototype.hasOwnProperty.call(table, name)) {
    const options = Object.keys(table);
    throw new ConfigError(`Invalid ${kind} type: ${name}. Available options are: \n${options.join(', ')}`, options);
  }
  return table[name];
}

export function agentFactory(name: string, table = AGENT_FACTORIES): AgentFactory {
  return lookup('player', table, name);
}

export function buildDeck(name: string, rng: RNG, table = DECK_PRESETS): Card[] {
  return lookup('deck', table, name)(rng);
}
