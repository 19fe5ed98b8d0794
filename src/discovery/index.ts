/**
 * Variables Discovery Module
 *
 * Builds the level table from the variables root.
 *
 * @module discovery
 */

export { readLevelTable, readDataFile } from './level-store';
export type { LevelStoreOptions } from './level-store';
