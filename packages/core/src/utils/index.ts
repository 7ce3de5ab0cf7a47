/**
 * @module utils/index
 * Re-exports the process and filesystem capabilities.
 */

export { spawnMerged, SPAWN_FAILURE_STATUS, type SpawnCommand, type SpawnOptions, type SpawnResult } from './shell.js';
export { NodeFileSystem, moveEntry, walk, type FileSystem } from './fs.js';
