/**
 * Run manifest
 */

export {
  CELL_ID_SEPARATOR,
  cellIdOf,
  laneKeyOf,
  generateRunId,
  createManifest,
  validateManifest,
  expandCells,
  canonicalJson,
  manifestFingerprint,
} from './manifest.js';
