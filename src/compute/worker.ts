import type { Logger } from 'pino';
import { createLogger } from '../log.js';
import type { BatchResult } from '../games/blackjack/simulate.js';
import { ChunkRequest, simulateChunk } from './tasks/simulate.js';

let log: Logger | undefined;

// piscina entry point: one chunk of rounds per call
export default function handleChunk(request: ChunkRequest): BatchResult {
    log ??= createLogger();
    return simulateChunk(request, log);
}
