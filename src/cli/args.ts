import { UserError } from '../utils/errors.js';

export type CliOptions = {
  player: string;
  count: number;
  verbose: boolean;
  rankSplit: boolean;
  deck: string;
  seed?: number;
  workers?: number;
  help: boolean;
};

export const USAGE = `
Run a simulation of a Blackjack agent.

USAGE:
  bj-sim [player] [options]

OPTIONS:
  -n, --count <n>                How many games to run (default: 100)
  -s, -q, --silent, --quiet      Only print the average score at the end
  -r, --rank, --rank-split       Only split two cards of the same rank
                                 (default: split two cards of the same value)
  -d, --deck <name>              Deck type to use (default: default)
  --seed <n>                     Seed every shuffle and random choice
  -w, --workers <n>              Play rounds on n worker threads (0 = inline)
  -h, --help                     Show this help message
`;

const VALUE_FLAGS: Record<string, 'count' | 'deck' | 'seed' | 'workers'> = {
  '-n': 'count',
  '--count': 'count',
  '-d': 'deck',
  '--deck': 'deck',
  '--seed': 'seed',
  '-w': 'workers',
  '--workers': 'workers',
};

function parseInteger(flag: string, raw: string, min: number): number {
  if (!/^-?\d+$/.test(raw.trim())) throw new UserError(`${flag} expects an integer, got "${raw}"`);
  const n = parseInt(raw, 10);
  if (n < min) throw new UserError(`${flag} must be >= ${min}, got ${n}`);
  return n;
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const opts: CliOptions = { player: 'default', count: 100, verbose: true, rankSplit: false, deck: 'default', help: false };
  let positional: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);

    switch (flag) {
      case '-h':
      case '--help':
        opts.help = true;
        continue;
      case '-s':
      case '-q':
      case '--silent':
      case '--quiet':
        opts.verbose = false;
        continue;
      case '-r':
      case '--rank':
      case '--rank-split':
        opts.rankSplit = true;
        continue;
    }

    const key = VALUE_FLAGS[flag];
    if (key) {
      let raw: string | undefined;
      if (eq !== -1) raw = arg.slice(eq + 1);
      else raw = argv[++i];
      if (raw === undefined) throw new UserError(`${flag} expects a value`);
      if (key === 'deck') opts.deck = raw;
      else if (key === 'count') opts.count = parseInteger(flag, raw, 1);
      else if (key === 'workers') opts.workers = parseInteger(flag, raw, 0);
      else opts.seed = parseInteger(flag, raw, Number.MIN_SAFE_INTEGER);
      continue;
    }

    if (arg.startsWith('-') && arg.length > 1) throw new UserError(`Unknown option: ${arg}`);
    if (positional !== undefined) throw new UserError(`Unexpected argument: ${arg}`);
    positional = arg;
  }

  if (positional !== undefined) opts.player = positional;
  return opts;
}
