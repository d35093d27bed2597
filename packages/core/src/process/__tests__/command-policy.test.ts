/**
 * Command Policy and Runner Tests
 */

import { describe, it, expect } from 'vitest';
import { tmpdir } from 'node:os';
import {
  PolicyError,
  tokenizeCommand,
  parseCommands,
  enforceCommandPolicy,
  runCommand,
  formatCommandLog,
  SPAWN_FAILURE_EXIT_CODE,
} from '../../index.js';

const DEFAULT_POLICY = { allowlist: [], denylist: ['rm', 'sudo', 'curl', 'wget'] };

describe('tokenizeCommand', () => {
  it('splits on whitespace', () => {
    expect(tokenizeCommand('npm  run\ttest ')).toEqual(['npm', 'run', 'test']);
  });

  it('keeps single-quoted text literal', () => {
    expect(tokenizeCommand(`echo 'a "b" \\c'`)).toEqual(['echo', 'a "b" \\c']);
  });

  it('honours escapes inside double quotes', () => {
    expect(tokenizeCommand('echo "say \\"hi\\" \\n"')).toEqual(['echo', 'say "hi" \\n']);
  });

  it('joins adjacent quoted and bare segments', () => {
    expect(tokenizeCommand(`a'b c'"d"e`)).toEqual(['ab cde']);
  });

  it('produces empty tokens for empty quotes', () => {
    expect(tokenizeCommand(`x '' ""`)).toEqual(['x', '', '']);
  });

  it('escapes a space outside quotes', () => {
    expect(tokenizeCommand('cat my\\ file.txt')).toEqual(['cat', 'my file.txt']);
  });

  it('rejects unterminated quotes', () => {
    expect(() => tokenizeCommand(`echo 'oops`)).toThrow(PolicyError);
    expect(() => tokenizeCommand('echo "oops')).toThrow('No closing quotation');
  });

  it('rejects a trailing backslash', () => {
    expect(() => tokenizeCommand('echo \\')).toThrow('No escaped character');
  });
});

describe('parseCommands', () => {
  it('rejects any pipe character', () => {
    expect(() => parseCommands(['npm test', 'cat log | grep x'])).toThrow(PolicyError);
    expect(() => parseCommands(["echo 'a|b'"])).toThrow('Pipelines are not allowed');
  });

  it('drops blank commands', () => {
    expect(parseCommands(['', '   ', 'node -v'])).toEqual([['node', '-v']]);
  });
});

describe('enforceCommandPolicy', () => {
  it('denies commands on the deny-list, by name or path', () => {
    expect(() => enforceCommandPolicy([['rm', '-rf', 'x']], DEFAULT_POLICY)).toThrow("Command 'rm' is denied by policy");
    expect(() => enforceCommandPolicy([['/usr/bin/curl', 'x']], DEFAULT_POLICY)).toThrow(PolicyError);
  });

  it('allows anything not denied when the allow-list is empty', () => {
    expect(() => enforceCommandPolicy([['node', '-v'], ['make']], DEFAULT_POLICY)).not.toThrow();
  });

  it('requires allow-list membership when one is configured', () => {
    const policy = { allowlist: ['node'], denylist: [] };
    expect(() => enforceCommandPolicy([['node', '-v']], policy)).not.toThrow();
    expect(() => enforceCommandPolicy([['node'], ['make']], policy)).toThrow("Command 'make' is not in the allowlist");
  });
});

describe('runCommand', () => {
  const cwd = tmpdir();

  it('captures stdout, stderr and exit code', () => {
    const result = runCommand(
      [process.execPath, '-e', 'process.stdout.write("out"); process.stderr.write("err"); process.exit(3)'],
      { cwd }
    );
    expect(result.exit_code).toBe(3);
    expect(result.stdout).toBe('out');
    expect(result.stderr).toBe('err');
    expect(result.duration_ms).toBeGreaterThanOrEqual(0);
  });

  it('does not interpret shell syntax', () => {
    const result = runCommand([process.execPath, '-e', 'console.log(process.argv[1])', '$HOME && ls'], { cwd });
    expect(result.exit_code).toBe(0);
    expect(result.stdout).toBe('$HOME && ls\n');
  });

  it('reports a missing program as a spawn failure', () => {
    const result = runCommand(['definitely-not-a-real-program-xyz'], { cwd });
    expect(result.exit_code).toBe(SPAWN_FAILURE_EXIT_CODE);
    expect(result.stderr).toContain('ENOENT');
  });

  it('formats a readable log', () => {
    const log = formatCommandLog('verify S-0001', [
      { argv: ['node', '-v'], exit_code: 0, stdout: 'v20.0.0\n', stderr: '', duration_ms: 5 },
    ]);
    expect(log).toBe(
      '# verify S-0001\n\n$ node -v\nexit_code: 0  duration_ms: 5\n--- stdout ---\nv20.0.0\n--- stderr ---\n\n\n'
    );
  });
});
