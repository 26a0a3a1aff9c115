import type { Logger } from 'pino';
import { sameRank, sameValue } from '../../games/blackjack/cards.js';
import { agentFactory } from '../../games/blackjack/registry.js';
import { BatchResult, runBatch } from '../../games/blackjack/simulate.js';
import type { Card } from '../../games/blackjack/types.js';
import { seededRNG } from '../../util/rng.js';

/** Everything a worker needs to play its share of a batch; must survive structured clone. */
export interface ChunkRequest {
    player: string;
    deck: Card[];
    rounds: number;
    firstRound: number;
    rankSplit: boolean;
    trials: number;
    seed?: number;
}

export function simulateChunk(req: ChunkRequest, logger?: Logger): BatchResult {
    const rng = seededRNG(req.seed);
    const splitRule = req.rankSplit ? sameRank : sameValue;
    const agent = agentFactory(req.player)({ deck: req.deck, splitRule, rng, trials: req.trials, logger });
    return runBatch({
        agent,
        deck: req.deck,
        rounds: req.rounds,
        firstRound: req.firstRound,
        splitRule,
        rng,
        logger,
    });
}

/** Splits `rounds` into at most `parts` contiguous chunks, each with its own seed. */
export function planChunks(base: Omit<ChunkRequest, 'rounds' | 'firstRound' | 'seed'>, rounds: number, parts: number, seed?: number): ChunkRequest[] {
    const count = Math.max(1, Math.min(parts, rounds));
    const size = Math.floor(rounds / count);
    const extra = rounds % count;
    const chunks: ChunkRequest[] = [];
    let firstRound = 0;
    for (let i = 0; i < count; i++) {
        const n = size + (i < extra ? 1 : 0);
        chunks.push({ ...base, rounds: n, firstRound, seed: seed === undefined ? undefined : seed + i });
        firstRound += n;
    }
    return chunks;
}
