import type { Action } from './types.js';

/** Weight of the exploration term in UCB1; higher favours less-visited nodes. */
export const CURIOSITY_FACTOR = 3.5;

export class SearchNode {
  readonly actionPath: readonly Action[];
  readonly children: SearchNode[] = [];
  total = 0;
  visits = 0;

  constructor(readonly parent: SearchNode | null = null, action?: Action) {
    this.actionPath = parent && action !== undefined ? [...parent.actionPath, action] : [];
  }

  get action(): Action | undefined {
    return this.actionPath[this.actionPath.length - 1];
  }
}

/** Mean reward, 0 before the first visit. */
export function score(node: SearchNode): number {
  return node.visits === 0 ? 0 : node.total / node.visits;
}

export function ucb1(node: SearchNode, iterations: number): number {
  if (node.visits === 0) return Infinity;
  return score(node) + CURIOSITY_FACTOR * Math.sqrt(Math.log(iterations) / node.visits);
}

/** First unvisited child if any, else the highest UCB1; null for a leaf. */
export function selectChild(node: SearchNode, iterations: number): SearchNode | null {
  let best: SearchNode | null = null;
  let bestScore = -Infinity;
  for (const candidate of node.children) {
    if (candidate.visits === 0) return candidate;
    const value = ucb1(candidate, iterations);
    if (best === null || value > bestScore) {
      best = candidate;
      bestScore = value;
    }
  }
  return best;
}

export function expand(node: SearchNode, actions: readonly Action[]): void {
  for (const action of actions) node.children.push(new SearchNode(node, action));
}

export function backpropagate(node: SearchNode, reward: number): void {
  for (let cur: SearchNode | null = node; cur !== null; cur = cur.parent) {
    cur.total += reward;
    cur.visits++;
  }
}

/** Last action of the root child with the highest mean; ties go to the earliest child. */
export function bestAction(root: SearchNode): Action {
  let best: SearchNode | null = null;
  for (const child of root.children) {
    if (best === null || score(child) > score(best)) best = child;
  }
  const action = best?.action;
  if (action === undefined) throw new Error('bestAction called on a node without children');
  return action;
}
