import boxen from 'boxen';
import chalk from 'chalk';
import logSymbols from 'log-symbols';
import prettyMs from 'pretty-ms';
import { isInteractive } from '../util/env.js';

export type Style = 'info' | 'success' | 'warn' | 'error' | 'dim' | 'title' | 'plain';

export type Printer = (line: string) => void;

const noColor = !!process.env.NO_COLOR || process.argv.includes('--no-color') || !isInteractive();
export const c = new chalk.Instance({ level: noColor ? 0 : 3 });

let out: Printer = (line) => console.log(line);

/** Redirects every line the CLI prints; returns the previous printer. */
export function setPrinter(next: Printer): Printer {
  const prev = out;
  out = next;
  return prev;
}

function say(msg: string, style: Style = 'plain') {
  let line = msg;
  switch (style) {
    case 'success': line = `${logSymbols.success} ${c.green(msg)}`; break;
    case 'warn': line = `${logSymbols.warning} ${c.yellow(msg)}`; break;
    case 'error': line = `${logSymbols.error} ${c.red(msg)}`; break;
    case 'info': line = `${logSymbols.info} ${c.cyan(msg)}`; break;
    case 'dim': line = c.gray(msg); break;
    case 'title': line = c.bold.cyan(msg); break;
    default: break;
  }
  out(line);
}

function summary(rows: Record<string, string | number>, elapsedMs: number) {
  if (!isInteractive()) return;
  const width = Math.max(...Object.keys(rows).map((k) => k.length));
  const body = Object.entries(rows)
    .map(([k, v]) => `${c.dim(k.padEnd(width))}  ${v}`)
    .concat(c.gray(`finished in ${prettyMs(elapsedMs)}`))
    .join('\n');
  out(boxen(body, { padding: 1, borderColor: 'cyan', borderStyle: 'round' }));
}

export const ui = { say, summary };
