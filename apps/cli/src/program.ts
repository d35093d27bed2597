/**
 * phasegate command tree
 *
 * Every action prints one JSON document on stdout and sets the process
 * exit code from the outcome status.
 *
 * @module @phasegate/cli/program
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { ENGINE_VERSION, SliceStatus } from '@phasegate/core';
import { execute, type CommandOutcome } from './output.js';
import type { GlobalOptions } from './session.js';
import { approveReadyCommand, validateReadyCommand } from './commands/gate.js';
import { replayCommand } from './commands/replay.js';
import { retroCommand, type RetroOptions } from './commands/retro.js';
import { markSliceCommand, runSliceCommand, type MarkSliceOptions, type RunSliceOptions } from './commands/slice.js';
import { statusCommand, type StatusOptions } from './commands/status.js';
import {
  approvePlanCommand,
  closeCommand,
  criticCommand,
  decisionCommand,
  freezeCommand,
  newTaskCommand,
  userCheckCommand,
  type ApproveOptions,
  type CriticOptions,
  type DecisionOptions,
  type NewTaskOptions,
  type TaskTarget,
} from './commands/task.js';
import { bootstrapCommand, registerModuleCommand } from './commands/workspace.js';

// =============================================================================
// Option Parsers
// =============================================================================

export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function parsePositive(value: string): number {
  const parsed = parseCount(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

function withTaskTarget(command: Command): Command {
  return command
    .requiredOption('--module-id <id>', 'Registered module id')
    .requiredOption('--task-id <id>', 'Task id, e.g. T-0001');
}

function withApproval(command: Command): Command {
  return withTaskTarget(command)
    .option('--approved-by <name>', 'Approver recorded in the approval')
    .option('--notes <text>', 'Approval notes');
}

// =============================================================================
// Program
// =============================================================================

export function createProgram(): Command {
  const program = new Command();

  program
    .name('phasegate')
    .description('Phase-gated engineering workflow: planned, frozen, gated and replayable')
    .version(ENGINE_VERSION)
    .option('--root <dir>', 'Repository root (default: working directory)')
    .option('--actor <name>', 'Actor recorded on events (default: PHASEGATE_ACTOR or "engine")');

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();
  const run = async (fn: () => Promise<CommandOutcome>): Promise<void> => {
    process.exitCode = await execute(fn);
  };

  // ===========================================================================
  // Workspace
  // ===========================================================================

  program
    .command('bootstrap')
    .description('Create .phasegate with default config, profile and registry')
    .action(async () => run(() => bootstrapCommand(globals())));

  const modules = program.command('module').description('Module registry');

  modules
    .command('register')
    .description('Register a module directory (relative to the repository root)')
    .argument('<module-id>', 'Module id')
    .argument('<path>', 'Module directory')
    .action(async (moduleId: string, path: string) => run(() => registerModuleCommand(globals(), { moduleId, path })));

  // ===========================================================================
  // Tasks
  // ===========================================================================

  const task = program.command('task').description('Plan, freeze and approve tasks');

  task
    .command('new')
    .description('Create a draft task from a slice drafts file')
    .requiredOption('--module-id <id>', 'Registered module id')
    .requiredOption('--title <title>', 'Task title')
    .requiredOption('--slices <file>', 'JSON file with the slice drafts')
    .option('--goal <text>', 'Goal written into plan.md')
    .option('--profile <name>', 'Gate profile (default: config default_profile)')
    .option('--mission-id <id>', 'Mission the task belongs to')
    .option('--max-attempts <n>', 'Attempt budget per slice', parsePositive)
    .action(async (options: NewTaskOptions) => run(() => newTaskCommand(globals(), options)));

  withTaskTarget(task.command('critic'))
    .description('Record the plan critic review; passes iff P0 = P1 = 0')
    .option('--p0 <n>', 'P0 findings', parseCount, 0)
    .option('--p1 <n>', 'P1 findings', parseCount, 0)
    .option('--p2 <n>', 'P2 findings', parseCount, 0)
    .option('--p3 <n>', 'P3 findings', parseCount, 0)
    .option('--notes <text>', 'Critic notes')
    .option('--reviewer <name>', 'Reviewer recorded in the report')
    .action(async (options: CriticOptions) => run(() => criticCommand(globals(), options)));

  withTaskTarget(task.command('freeze'))
    .description('Hash plan.md and slices.json into freeze.json')
    .action(async (options: TaskTarget) => run(() => freezeCommand(globals(), options)));

  withApproval(task.command('approve-plan'))
    .description('Approve the frozen plan')
    .action(async (options: ApproveOptions) => run(() => approvePlanCommand(globals(), options)));

  withApproval(task.command('user-check'))
    .description('Record the manual user check')
    .action(async (options: ApproveOptions) => run(() => userCheckCommand(globals(), options)));

  withTaskTarget(task.command('decision'))
    .description('Append a decision to decisions.jsonl')
    .requiredOption('--decision <text>', 'What was decided')
    .option('--rationale <text>', 'Why')
    .action(async (options: DecisionOptions) => run(() => decisionCommand(globals(), options)));

  withTaskTarget(task.command('close'))
    .description('Close a task after its retro')
    .action(async (options: TaskTarget) => run(() => closeCommand(globals(), options)));

  // ===========================================================================
  // Slices
  // ===========================================================================

  const slice = program.command('slice').description('Execute and override slices');

  withTaskTarget(slice.command('run'))
    .description('Run one slice attempt through the gate pipeline')
    .requiredOption('--slice-id <id>', 'Slice id, e.g. S-0001')
    .option('--implement <command>', 'Implementation command, run without a shell')
    .option('--p0 <n>', 'Review P0 findings', parseCount)
    .option('--p1 <n>', 'Review P1 findings', parseCount)
    .option('--p2 <n>', 'Review P2 findings', parseCount)
    .option('--p3 <n>', 'Review P3 findings', parseCount)
    .option('--review-notes <text>', 'Review notes')
    .option('--reviewer <name>', 'Reviewer recorded in the review proof')
    .option('--verify-cmd <command>', 'Verify command (repeatable); overrides the declared ones', collect)
    .option('--e2e <command>', 'E2E command (repeatable); overrides the declared ones', collect)
    .action(async (options: RunSliceOptions) => run(() => runSliceCommand(globals(), options)));

  withTaskTarget(slice.command('mark'))
    .description('Override a slice status with a note')
    .requiredOption('--slice-id <id>', 'Slice id')
    .addOption(
      new Option('--status <status>', 'New slice status')
        .choices(SliceStatus.options.filter((status) => status !== 'done'))
        .makeOptionMandatory()
    )
    .requiredOption('--note <text>', 'Why the status was overridden')
    .action(async (options: MarkSliceOptions) => run(() => markSliceCommand(globals(), options)));

  // ===========================================================================
  // Gates
  // ===========================================================================

  const gate = program.command('gate').description('Task-level ready gate');

  withTaskTarget(gate.command('validate-ready'))
    .description('Run the ready gate and write READY/handoff.md')
    .action(async (options: TaskTarget) => run(() => validateReadyCommand(globals(), options)));

  withApproval(gate.command('approve-ready'))
    .description('Approve a validated task')
    .action(async (options: ApproveOptions) => run(() => approveReadyCommand(globals(), options)));

  // ===========================================================================
  // Retro, Replay, Status
  // ===========================================================================

  const retro = program.command('retro').description('Retrospectives');

  withTaskTarget(retro.command('run'))
    .description('Cluster incidents into retro.md and a patch proposal')
    .option('--feedback <text>', 'User feedback recorded in the retro')
    .action(async (options: RetroOptions) => run(() => retroCommand(globals(), options)));

  program
    .command('replay')
    .description('Replay the event log and check invariants against the artifacts on disk')
    .option('--window <n>', 'Number of most recent events to replay', parsePositive)
    .action(async (options: { window?: number }) => run(() => replayCommand(globals(), { window: options.window })));

  program
    .command('status')
    .description('Show one task, or list every task')
    .option('--module-id <id>', 'Limit to one module')
    .option('--task-id <id>', 'Show one task in detail (needs --module-id)')
    .action(async (options: StatusOptions) => run(() => statusCommand(globals(), options)));

  return program;
}
