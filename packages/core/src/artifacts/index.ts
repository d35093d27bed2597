/**
 * Artifacts
 *
 * @module @phasegate/core/artifacts
 */

export {
  pathExists,
  writeTextAtomic,
  writeJsonAtomic,
  writeRecord,
  readTextIfExists,
  readRecord,
  readRecordIfExists,
  appendJsonLine,
  readJsonLines,
} from './artifact-store.js';

export { sha256Hex, sha256File, snapshotTree, diffSnapshots, SNAPSHOT_IGNORED, type Snapshot } from './hashing.js';
