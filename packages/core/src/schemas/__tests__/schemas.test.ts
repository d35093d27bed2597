/**
 * Record Schema Tests
 */

import { describe, it, expect } from 'vitest';
import {
  SchemaValidationError,
  SlicesDocument,
  TaskState,
  EventEnvelope,
  ProofManifest,
  LocalConfig,
  parseRecord,
  toEventTimestamp,
} from '../../index.js';

const slice = (id: string) => ({
  slice_id: id,
  allowed_paths: ['src'],
  required_gates: ['scope', 'verify'],
  deps: [],
  verify_commands: ['node -v'],
});

const taskState = {
  task_id: 'T-0001',
  module_id: 'app',
  mission_id: null,
  profile: 'default',
  status: 'executing',
  blocked_reason: null,
  max_attempts: 2,
  slices: {},
  created_at: '2026-03-01T10:00:00Z',
  updated_at: '2026-03-01T10:00:00Z',
};

describe('SlicesDocument', () => {
  it('fills optional slice fields with defaults', () => {
    const doc = parseRecord(SlicesDocument, 'slices', { task_id: 'T-0001', slices: [slice('S-0001')] });
    expect(doc.slices[0]).toEqual({
      ...slice('S-0001'),
      title: '',
      traceability: [],
      max_attempts: null,
      e2e_required: false,
      e2e_commands: [],
    });
  });

  it('rejects duplicate slice ids', () => {
    expect(() =>
      parseRecord(SlicesDocument, 'slices', { task_id: 'T-0001', slices: [slice('S-0001'), slice('S-0001')] })
    ).toThrow('duplicate slice_id S-0001');
  });

  it('rejects unknown gates', () => {
    expect(() =>
      parseRecord(SlicesDocument, 'slices', {
        task_id: 'T-0001',
        slices: [{ ...slice('S-0001'), required_gates: ['lint'] }],
      })
    ).toThrow(SchemaValidationError);
  });
});

describe('TaskState', () => {
  it('accepts a well-formed task', () => {
    expect(parseRecord(TaskState, 'task_state', taskState).status).toBe('executing');
  });

  it('requires blocked_reason when blocked', () => {
    expect(() => parseRecord(TaskState, 'task_state', { ...taskState, status: 'blocked' })).toThrow(
      'blocked_reason: blocked_reason is required when status is blocked'
    );
  });

  it('requires max_attempts > 0', () => {
    expect(() => parseRecord(TaskState, 'task_state', { ...taskState, max_attempts: 0 })).toThrow(SchemaValidationError);
  });
});

describe('ProofManifest', () => {
  it('is tagged', () => {
    expect(() =>
      parseRecord(ProofManifest, 'manifest', {
        kind: 'scope',
        task_id: 'T-0001',
        slice_id: 'S-0001',
        gates: { scope: true, verify: true, review: true, e2e: null },
        proofs: {},
        written_at: '2026-03-01T10:00:00Z',
      })
    ).toThrow(SchemaValidationError);
  });
});

describe('EventEnvelope', () => {
  it('requires second-precision UTC timestamps', () => {
    const event = {
      id: 'e1',
      ts: '2026-03-01T10:00:00.123Z',
      type: 'x',
      actor: 'engine',
      mission_id: null,
      module_id: null,
      task_id: null,
      slice_id: null,
      repo_revision: null,
      worktree_path: null,
      payload: {},
      artifact_refs: [],
      engine_version: '1',
    };
    expect(EventEnvelope.safeParse(event).success).toBe(false);
    expect(EventEnvelope.safeParse({ ...event, ts: '2026-03-01T10:00:00Z' }).success).toBe(true);
  });

  it('formats timestamps at second precision', () => {
    expect(toEventTimestamp(new Date('2026-03-01T10:00:00.999Z'))).toBe('2026-03-01T10:00:00Z');
  });
});

describe('LocalConfig', () => {
  it('defaults every key', () => {
    expect(parseRecord(LocalConfig, 'local config', {})).toEqual({
      default_profile: 'default',
      allowlist_commands: [],
      denylist_commands: ['rm', 'sudo', 'curl', 'wget'],
      user_check_mode: 'profile_optional',
      default_max_attempts: 2,
      replay_window: 5000,
    });
  });
});
