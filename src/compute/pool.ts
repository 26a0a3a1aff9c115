import fs from 'node:fs';
import path from 'node:path';
import Piscina from 'piscina';
import type { Logger } from 'pino';
import { BatchResult, mergeResults } from '../games/blackjack/simulate.js';
import { ConfigError, normalizeError } from '../utils/errors.js';
import type { ChunkRequest } from './tasks/simulate.js';

const WORKER_FILE = path.join(__dirname, 'worker.js');

export class ComputePool {
    private pool?: Piscina;

    constructor(private readonly log: Logger) {}

    init(threads: number): void {
        if (this.pool) return;
        // workers load compiled output; a ts-jest or source run has no worker.js beside this file
        if (!fs.existsSync(WORKER_FILE)) {
            throw new ConfigError(`Parallel runs need the compiled worker at ${WORKER_FILE}; run the build first or use --workers 0`);
        }
        this.pool = new Piscina({
            filename: WORKER_FILE,
            maxThreads: threads,
            minThreads: Math.min(2, threads),
            idleTimeout: 30000,
        });
        this.log.info({ msg: 'compute_pool_initialized', maxThreads: threads });
    }

    async runChunks(chunks: readonly ChunkRequest[]): Promise<BatchResult> {
        const pool = this.pool;
        if (!pool) throw new Error('Compute pool not initialized');
        try {
            const parts: BatchResult[] = await Promise.all(chunks.map((chunk) => pool.run(chunk)));
            return mergeResults(parts);
        } catch (error) {
            this.log.error({ msg: 'compute_task_error', error: normalizeError(error).message });
            throw error;
        }
    }

    async destroy(): Promise<void> {
        if (!this.pool) return;
        await this.pool.destroy();
        this.pool = undefined;
        this.log.info({ msg: 'compute_pool_destroyed' });
    }
}
