#!/usr/bin/env node

/**
 * phasegate CLI
 *
 * Drives the phase-gated workflow engine. Each invocation runs one command
 * to completion, prints one JSON document on stdout, logs to stderr and
 * exits with the outcome's exit code:
 *
 *   phasegate bootstrap                 Create .phasegate in the repository
 *   phasegate module register <id> <p>  Register a module directory
 *   phasegate task new|critic|freeze|approve-plan|user-check|decision|close
 *   phasegate slice run|mark            Execute or override a slice
 *   phasegate gate validate-ready|approve-ready
 *   phasegate retro run                 Write retro.md and a patch proposal
 *   phasegate replay                    Check invariants over the event log
 *   phasegate status                    Show tasks and slices
 *
 * Exit codes: 0 ok, 10 gate outcome, 20 error, 30 replay failure.
 *
 * Environment:
 *   PHASEGATE_ACTOR      Default event actor
 *   PHASEGATE_LOG_LEVEL  Minimum log severity (stderr)
 */

import { createLogger, setLogger } from '@phasegate/core';
import { createProgram } from './program.js';

setLogger(createLogger('phasegate-cli'));

await createProgram().parseAsync(process.argv);
