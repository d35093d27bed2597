/**
 * Artifact Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  FreezeRecord,
  Incident,
  NotFoundError,
  SchemaValidationError,
  appendJsonLine,
  diffSnapshots,
  pathExists,
  readJsonLines,
  readRecord,
  readRecordIfExists,
  sha256Hex,
  snapshotTree,
  writeRecord,
  writeTextAtomic,
} from '../../index.js';

let testDir: string;

beforeEach(async () => {
  testDir = await fs.mkdtemp(join(tmpdir(), 'phasegate-artifacts-'));
});

afterEach(async () => {
  await fs.rm(testDir, { recursive: true, force: true });
});

const HASH_A = sha256Hex('plan A');
const HASH_B = sha256Hex('slices B');

// =============================================================================
// Atomic writes
// =============================================================================

describe('writeTextAtomic', () => {
  it('creates parent directories and leaves no temp files', async () => {
    const path = join(testDir, 'deep', 'nested', 'file.md');
    await writeTextAtomic(path, 'hello');
    await writeTextAtomic(path, 'hello again');

    expect(await fs.readFile(path, 'utf-8')).toBe('hello again');
    expect(await fs.readdir(join(testDir, 'deep', 'nested'))).toEqual(['file.md']);
  });
});

describe('record round trip', () => {
  it('validates before writing and reads back the same record', async () => {
    const path = join(testDir, 'freeze.json');
    const record = {
      task_id: 'T-0001',
      plan_sha256: HASH_A,
      slices_sha256: HASH_B,
      frozen_at: '2026-03-01T10:00:00Z',
    };

    await writeRecord(path, FreezeRecord, 'freeze', record);
    expect(await readRecord(path, FreezeRecord, 'freeze')).toEqual(record);
    expect((await fs.readFile(path, 'utf-8')).endsWith('}\n')).toBe(true);
  });

  it('refuses to write an invalid record', async () => {
    const path = join(testDir, 'freeze.json');
    await expect(
      writeRecord(path, FreezeRecord, 'freeze', {
        task_id: 'T-0001',
        plan_sha256: 'not-a-hash',
        slices_sha256: HASH_B,
        frozen_at: '2026-03-01T10:00:00Z',
      })
    ).rejects.toThrow(SchemaValidationError);
    expect(await pathExists(path)).toBe(false);
  });

  it('reports missing keys on read', async () => {
    const path = join(testDir, 'freeze.json');
    await fs.writeFile(path, JSON.stringify({ task_id: 'T-0001' }));

    try {
      await readRecord(path, FreezeRecord, 'freeze');
      expect.fail('expected SchemaValidationError');
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      if (error instanceof SchemaValidationError) {
        expect(error.kind).toBe('freeze');
        expect(error.issues.some((issue) => issue.startsWith('plan_sha256:'))).toBe(true);
      }
    }
  });

  it('treats malformed JSON as a schema error', async () => {
    const path = join(testDir, 'freeze.json');
    await fs.writeFile(path, '{ not json');
    await expect(readRecord(path, FreezeRecord, 'freeze')).rejects.toThrow('file is not valid JSON');
  });

  it('distinguishes missing files', async () => {
    const path = join(testDir, 'absent.json');
    expect(await readRecordIfExists(path, FreezeRecord, 'freeze')).toBeNull();
    await expect(readRecord(path, FreezeRecord, 'freeze')).rejects.toThrow(NotFoundError);
  });
});

describe('JSON lines', () => {
  it('appends and reads validated lines', async () => {
    const path = join(testDir, 'logs', 'incidents.jsonl');
    const incident = {
      id: 'INC-0123456789ab',
      severity: 'medium' as const,
      kind: 'verify_fail' as const,
      phase: 'verify',
      module_id: 'app',
      task_id: 'T-0001',
      slice_id: 'S-0001',
      message: 'verify failed',
      remediation: 'fix the tests',
      context: { attempts: 1 },
      created_at: '2026-03-01T10:00:00Z',
    };

    await appendJsonLine(path, Incident, 'incident', incident);
    await appendJsonLine(path, Incident, 'incident', { ...incident, id: 'INC-ba9876543210' });

    const lines = await readJsonLines(path, Incident, 'incident');
    expect(lines.map((l) => l.id)).toEqual(['INC-0123456789ab', 'INC-ba9876543210']);
    expect(await readJsonLines(join(testDir, 'none.jsonl'), Incident, 'incident')).toEqual([]);
  });
});

// =============================================================================
// Snapshots
// =============================================================================

describe('snapshotTree / diffSnapshots', () => {
  it('reports added, modified and removed files, sorted', async () => {
    await fs.mkdir(join(testDir, 'src'), { recursive: true });
    await fs.writeFile(join(testDir, 'src', 'keep.ts'), 'keep');
    await fs.writeFile(join(testDir, 'src', 'edit.ts'), 'v1');
    await fs.writeFile(join(testDir, 'gone.txt'), 'bye');

    const before = await snapshotTree(testDir);

    await fs.writeFile(join(testDir, 'src', 'edit.ts'), 'v2');
    await fs.rm(join(testDir, 'gone.txt'));
    await fs.writeFile(join(testDir, 'added.md'), 'new');

    const after = await snapshotTree(testDir);
    expect(diffSnapshots(before, after)).toEqual(['added.md', 'gone.txt', 'src/edit.ts']);
  });

  it('ignores engine state and git metadata at the root', async () => {
    const before = await snapshotTree(testDir);

    await fs.mkdir(join(testDir, '.phasegate', 'run'), { recursive: true });
    await fs.writeFile(join(testDir, '.phasegate', 'run', 'proof.json'), '{}');
    await fs.mkdir(join(testDir, '.git'), { recursive: true });
    await fs.writeFile(join(testDir, '.git', 'HEAD'), 'ref');
    await fs.mkdir(join(testDir, 'pkg', '.phasegate'), { recursive: true });
    await fs.writeFile(join(testDir, 'pkg', '.phasegate', 'x'), 'nested is not ignored');

    const after = await snapshotTree(testDir);
    expect(diffSnapshots(before, after)).toEqual(['pkg/.phasegate/x']);
  });
});
