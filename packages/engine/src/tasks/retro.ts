/**
 * Retrospective and Close
 *
 * Clusters a task's incidents, writes retro.md and a patch proposal for the
 * local overlay, then closes the task:
 *
 *   ready_approved | blocked → retro_done → closed
 *
 * @module @phasegate/engine/tasks/retro
 */

import { join } from 'node:path';
import {
  Incident,
  readJsonLines,
  validateTransition,
  writeTextAtomic,
  type IncidentKind,
  type TaskState,
} from '@phasegate/core';
import { emit, fileStamp, timestamp, type EngineContext } from '../context.js';
import { loadTaskState, transitionTask, withTask } from './task-store.js';

export const RETRO_FAMILIES = ['env', 'toolchain', 'plan', 'test', 'process'] as const;

export type RetroFamily = (typeof RETRO_FAMILIES)[number];

export const INCIDENT_FAMILY: Record<IncidentKind, RetroFamily> = {
  verify_policy_reject: 'env',
  implement_fail: 'toolchain',
  verify_fail: 'toolchain',
  e2e_fail: 'toolchain',
  scope_violation: 'plan',
  scope_config_missing: 'plan',
  verify_config_missing: 'plan',
  e2e_missing: 'test',
  token_waste: 'process',
  review_fail: 'process',
};

const PATCH_PROPOSALS: Record<RetroFamily, string> = {
  env: 'Review allowlist_commands and denylist_commands in .phasegate/local/config.json.',
  toolchain: 'Pin the toolchain used by implement and verify commands in the local profile.',
  plan: 'Declare allowed_paths and gate commands for every slice before the freeze.',
  test: 'Add e2e commands to the profile for slices that require e2e.',
  process: 'Revisit max_attempts and review expectations in the local profile.',
};

export type IncidentClusters = Record<RetroFamily, Incident[]>;

export function clusterIncidents(incidents: readonly Incident[]): IncidentClusters {
  const clusters: IncidentClusters = { env: [], toolchain: [], plan: [], test: [], process: [] };
  for (const incident of incidents) {
    clusters[INCIDENT_FAMILY[incident.kind]].push(incident);
  }
  return clusters;
}

export function renderRetro(state: TaskState, clusters: IncidentClusters, feedback: string): string {
  const total = RETRO_FAMILIES.reduce((sum, family) => sum + clusters[family].length, 0);
  const outcome = state.status === 'blocked' ? `blocked (${state.blocked_reason ?? 'no reason'})` : state.status;
  const lines = [
    `# Retro for ${state.task_id}`,
    '',
    `Module: ${state.module_id}`,
    `Outcome: ${outcome}`,
    `Incidents: ${total}`,
    '',
    '## Clusters',
  ];

  for (const family of RETRO_FAMILIES) {
    lines.push(`### ${family}`);
    const items = clusters[family];
    if (items.length === 0) {
      lines.push('- no incidents');
    }
    for (const item of items) {
      lines.push(`- ${item.kind}${item.slice_id ? ` (${item.slice_id})` : ''}: ${item.message}`);
    }
    lines.push('');
  }

  lines.push('## Slices');
  const slices = Object.entries(state.slices).sort(([a], [b]) => a.localeCompare(b));
  if (slices.length === 0) {
    lines.push('- no slices ran');
  }
  for (const [id, slice] of slices) {
    lines.push(`- ${id}: ${slice.status} after ${slice.attempts} attempt(s)`);
  }

  lines.push('', '## User feedback', `- ${feedback || 'none'}`, '');
  return lines.join('\n');
}

export function renderPatchProposal(taskId: string, clusters: IncidentClusters): string {
  const lines = [`# Local patch proposals from ${taskId}`, ''];
  const families = RETRO_FAMILIES.filter((family) => clusters[family].length > 0);
  if (families.length === 0) {
    lines.push('- No incidents recorded; no changes proposed.');
  }
  for (const family of families) {
    lines.push(`- ${family}: ${PATCH_PROPOSALS[family]}`);
  }
  lines.push('');
  return lines.join('\n');
}

export interface RetroResult {
  retroPath: string;
  patchPath: string;
  incidents: number;
  clusters: Record<RetroFamily, number>;
}

/**
 * Write the retrospective for an approved or blocked task
 */
export async function runRetro(
  ctx: EngineContext,
  input: { moduleId: string; taskId: string; feedback?: string }
): Promise<RetroResult> {
  return withTask(ctx, 'retro.run', input.moduleId, input.taskId, async (scope) => {
    const state = await loadTaskState(scope);
    validateTransition(state.status, 'retro_done');

    const incidents = await readJsonLines(scope.paths.incidentsFile, Incident, 'incident');
    const clusters = clusterIncidents(incidents);

    const retroPath = await writeTextAtomic(scope.paths.retroFile, renderRetro(state, clusters, input.feedback ?? ''));
    const patchPath = await writeTextAtomic(
      join(ctx.layout.patchesDir, `${scope.taskId}-${fileStamp(timestamp(ctx))}.md`),
      renderPatchProposal(scope.taskId, clusters)
    );

    const counts = {
      env: clusters.env.length,
      toolchain: clusters.toolchain.length,
      plan: clusters.plan.length,
      test: clusters.test.length,
      process: clusters.process.length,
    };

    await transitionTask(ctx, scope, 'retro_done', {
      event: {
        type: 'retro.completed',
        payload: { incidents: incidents.length, clusters: counts },
        artifacts: [retroPath, patchPath],
      },
    });

    return { retroPath, patchPath, incidents: incidents.length, clusters: counts };
  });
}

export async function closeTask(ctx: EngineContext, moduleId: string, taskId: string): Promise<TaskState> {
  return withTask(ctx, 'task.close', moduleId, taskId, async (scope) =>
    transitionTask(ctx, scope, 'closed', { event: { type: 'task.closed' } })
  );
}
