import type { Logger } from 'pino';
import { ComputePool } from '../compute/pool.js';
import { planChunks } from '../compute/tasks/simulate.js';
import { SimConfig, loadSimConfig } from '../config/index.js';
import { sameRank, sameValue } from '../games/blackjack/cards.js';
import { agentFactory, buildDeck } from '../games/blackjack/registry.js';
import { BatchResult, runBatch } from '../games/blackjack/simulate.js';
import type { Card } from '../games/blackjack/types.js';
import { createLogger } from '../log.js';
import { seededRNG } from '../util/rng.js';
import { UserError } from '../utils/errors.js';
import { CliOptions, USAGE, parseArgs } from './args.js';
import { createNarrator } from './narrate.js';
import { ui } from './ui.js';

function runInline(opts: CliOptions, cfg: SimConfig, deck: Card[], log: Logger, seed?: number): BatchResult {
  const rng = seededRNG(seed);
  const splitRule = opts.rankSplit ? sameRank : sameValue;
  const agent = agentFactory(opts.player)({ deck, splitRule, rng, trials: cfg.searchTrials, logger: log });
  return runBatch({
    agent,
    deck,
    rounds: opts.count,
    splitRule,
    rng,
    logger: log,
    observer: opts.verbose ? createNarrator(agent.name) : undefined,
    onRound: opts.verbose ? (round, result) => ui.say(`Round ${round}: ${result.reward}\n`, 'dim') : undefined,
  });
}

async function runParallel(opts: CliOptions, cfg: SimConfig, deck: Card[], log: Logger, workers: number, seed?: number): Promise<BatchResult> {
  if (opts.verbose) ui.say('Round narration is not available with worker threads', 'warn');
  // unknown player names fail here, before any thread starts
  agentFactory(opts.player);
  const chunks = planChunks(
    { player: opts.player, deck, rankSplit: opts.rankSplit, trials: cfg.searchTrials },
    opts.count,
    workers,
    seed,
  );
  const pool = new ComputePool(log);
  try {
    pool.init(workers);
    return await pool.runChunks(chunks);
  } finally {
    await pool.destroy();
  }
}

/** Runs the simulator and returns the process exit code. */
export async function runCli(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let opts: CliOptions;
  let cfg: SimConfig;
  try {
    opts = parseArgs(argv);
    cfg = loadSimConfig(env);
  } catch (err) {
    if (!(err instanceof UserError)) throw err;
    ui.say(err.message, 'error');
    ui.say(USAGE);
    return 1;
  }
  if (opts.help) {
    ui.say(USAGE);
    return 0;
  }

  // quiet runs print only the average unless LOG_LEVEL asks for more
  const log = createLogger(opts.verbose || env.LOG_LEVEL ? cfg.logLevel : 'warn');
  const seed = opts.seed ?? cfg.seed;
  const workers = opts.workers ?? cfg.workers;
  const started = Date.now();

  let result: BatchResult;
  try {
    const deck = buildDeck(opts.deck, seededRNG(seed));
    log.info({ msg: 'batch_start', player: opts.player, deck: opts.deck, rounds: opts.count, workers, seed });
    result = workers > 0
      ? await runParallel(opts, cfg, deck, log, workers, seed)
      : runInline(opts, cfg, deck, log, seed);
  } catch (err) {
    if (!(err instanceof UserError)) throw err;
    ui.say(err.message, 'error');
    return 1;
  }

  const elapsed = Date.now() - started;
  log.info({ msg: 'batch_end', completed: result.rewards.length, failed: result.failures.length, average: result.average, ms: elapsed });
  if (result.failures.length > 0) {
    ui.say(`${result.failures.length} round(s) failed and were left out of the average`, 'warn');
  }
  ui.say(`Average points: ${result.average}`);
  ui.summary({ player: opts.player, deck: opts.deck, rounds: result.rewards.length, failed: result.failures.length }, elapsed);
  return 0;
}
