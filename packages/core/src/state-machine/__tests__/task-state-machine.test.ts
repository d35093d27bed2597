/**
 * Task State Machine Tests
 */

import { describe, it, expect } from 'vitest';
import {
  TaskStatus,
  TASK_TRANSITIONS,
  TransitionError,
  isValidTransition,
  validateTransition,
  planTransition,
  isTerminalStatus,
  isExecutableStatus,
  canUpdateSlice,
} from '../../index.js';

const ALL_STATUSES = TaskStatus.options;

describe('Task State Machine', () => {
  describe('transition table', () => {
    it('accepts every listed transition', () => {
      for (const from of ALL_STATUSES) {
        for (const to of TASK_TRANSITIONS[from]) {
          expect(isValidTransition(from, to)).toBe(true);
          expect(() => validateTransition(from, to)).not.toThrow();
        }
      }
    });

    it('rejects every pair not in the table with TransitionError', () => {
      let rejected = 0;
      for (const from of ALL_STATUSES) {
        for (const to of ALL_STATUSES) {
          if (TASK_TRANSITIONS[from].includes(to)) continue;
          expect(() => validateTransition(from, to)).toThrow(TransitionError);
          rejected++;
        }
      }
      // 10 statuses squared, minus the 11 listed edges
      expect(rejected).toBe(89);
    });

    it('gives closed no outgoing transitions', () => {
      expect(TASK_TRANSITIONS.closed).toEqual([]);
      expect(isTerminalStatus('closed')).toBe(true);
      expect(isTerminalStatus('blocked')).toBe(false);
    });

    it('follows the happy path from draft to closed', () => {
      const path: TaskStatus[] = [
        'draft',
        'critic_passed',
        'frozen',
        'plan_approved',
        'executing',
        'ready_validated',
        'ready_approved',
        'retro_done',
        'closed',
      ];
      for (let i = 0; i < path.length - 1; i++) {
        expect(isValidTransition(path[i], path[i + 1])).toBe(true);
      }
    });

    it('allows blocking only from executing and ready_validated', () => {
      const canBlock = ALL_STATUSES.filter((s) => isValidTransition(s, 'blocked'));
      expect(canBlock).toEqual(['executing', 'ready_validated']);
    });
  });

  describe('planTransition', () => {
    it('treats same-state requests as an echo only when allowed', () => {
      expect(planTransition('frozen', 'frozen', { allowEcho: true })).toEqual({ kind: 'echo', status: 'frozen' });
      expect(() => planTransition('frozen', 'frozen')).toThrow(TransitionError);
    });

    it('describes a real transition', () => {
      expect(planTransition('frozen', 'plan_approved')).toEqual({
        kind: 'transition',
        from: 'frozen',
        to: 'plan_approved',
      });
    });

    it('carries from/to on the error', () => {
      try {
        planTransition('draft', 'closed');
        expect.fail('expected TransitionError');
      } catch (error) {
        expect(error).toBeInstanceOf(TransitionError);
        if (error instanceof TransitionError) {
          expect(error.from).toBe('draft');
          expect(error.to).toBe('closed');
          expect(error.code).toBe('INVALID_TRANSITION');
        }
      }
    });
  });

  describe('executable statuses', () => {
    it('allows slice attempts only while approved or executing', () => {
      expect(ALL_STATUSES.filter(isExecutableStatus)).toEqual(['plan_approved', 'executing', 'ready_validated']);
    });
  });

  describe('slice updates', () => {
    it('never leaves done', () => {
      expect(canUpdateSlice('done', 'running')).toBe(false);
      expect(canUpdateSlice('done', 'done')).toBe(true);
      expect(canUpdateSlice('gate_failed', 'running')).toBe(true);
      expect(canUpdateSlice('blocked', 'done')).toBe(true);
    });
  });
});
