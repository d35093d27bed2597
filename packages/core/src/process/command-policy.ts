/**
 * Command Policy
 *
 * Gate commands are declared as raw strings and executed without a shell.
 * They are tokenized with POSIX quoting rules, pipelines are rejected, and
 * the first token of each argv is checked against the operator's
 * allow-list and deny-list before anything runs.
 *
 * @module @phasegate/core/process/command-policy
 */

import { basename } from 'node:path';
import { PolicyError } from '../reliability/errors.js';

export interface CommandPolicy {
  /** Empty means every command not on the deny-list is allowed */
  allowlist: readonly string[];
  denylist: readonly string[];
}

const WHITESPACE = new Set([' ', '\t', '\n', '\r']);
const DOUBLE_QUOTE_ESCAPABLE = new Set(['\\', '"', '$', '`', '\n']);

/**
 * Split a command line into argv using POSIX shell quoting, without
 * expansion of any kind.
 */
export function tokenizeCommand(raw: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let i = 0;

  while (i < raw.length) {
    const ch = raw[i];

    if (WHITESPACE.has(ch)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
      i += 1;
      continue;
    }

    inToken = true;

    if (ch === "'") {
      const end = raw.indexOf("'", i + 1);
      if (end === -1) {
        throw new PolicyError(`No closing quotation in command: ${raw}`, { command: raw });
      }
      current += raw.slice(i + 1, end);
      i = end + 1;
      continue;
    }

    if (ch === '"') {
      i += 1;
      let closed = false;
      while (i < raw.length) {
        const inner = raw[i];
        if (inner === '"') {
          closed = true;
          i += 1;
          break;
        }
        if (inner === '\\' && i + 1 < raw.length && DOUBLE_QUOTE_ESCAPABLE.has(raw[i + 1])) {
          current += raw[i + 1];
          i += 2;
          continue;
        }
        current += inner;
        i += 1;
      }
      if (!closed) {
        throw new PolicyError(`No closing quotation in command: ${raw}`, { command: raw });
      }
      continue;
    }

    if (ch === '\\') {
      if (i + 1 >= raw.length) {
        throw new PolicyError(`No escaped character in command: ${raw}`, { command: raw });
      }
      current += raw[i + 1];
      i += 2;
      continue;
    }

    current += ch;
    i += 1;
  }

  if (inToken) {
    tokens.push(current);
  }
  return tokens;
}

/**
 * Tokenize gate commands. Any `|` in a raw command is rejected outright;
 * blank commands are dropped.
 */
export function parseCommands(rawCommands: readonly string[]): string[][] {
  const argvs: string[][] = [];
  for (const raw of rawCommands) {
    if (raw.includes('|')) {
      throw new PolicyError(`Pipelines are not allowed in gate commands: ${raw}`, { command: raw });
    }
    const argv = tokenizeCommand(raw);
    if (argv.length > 0) {
      argvs.push(argv);
    }
  }
  return argvs;
}

/**
 * Check the first token of every argv against the policy. Matching is on the
 * token as written and on its basename, so `/bin/rm` is caught by `rm`.
 */
export function enforceCommandPolicy(argvs: readonly string[][], policy: CommandPolicy): void {
  for (const argv of argvs) {
    const [program] = argv;
    if (program === undefined) {
      continue;
    }
    const names = [program, basename(program)];

    if (names.some((name) => policy.denylist.includes(name))) {
      throw new PolicyError(`Command '${program}' is denied by policy`, { command: argv.join(' '), program });
    }
    if (policy.allowlist.length > 0 && !names.some((name) => policy.allowlist.includes(name))) {
      throw new PolicyError(`Command '${program}' is not in the allowlist`, { command: argv.join(' '), program });
    }
  }
}
