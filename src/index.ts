export { PollWatcher, MIN_INTERVAL_MS, type PollWatcherOptions } from './services/poll-watcher.js';
export { PathLister, nodeFileSystem, isNotFoundError, type FileSystemAdapter, type ListOptions } from './services/path-lister.js';
export { SnapshotStore } from './services/snapshot-store.js';
export { diffSnapshots, isSameFile } from './services/diff-engine.js';
export { EventDispatcher, type DeliveryOutcome } from './services/event-dispatcher.js';
export { regexFilterHook } from './services/filter-hooks.js';
export { formatEvent, formatOperation } from './services/event-format.js';
export {
    DEFAULT_CONFIG,
    applyConfig,
    applyEnvOverrides,
    readConfig,
    validateConfig,
    type PollWatchConfig,
} from './config/watcher-config.js';
export { Channel } from './utils/channel.js';
export { configureLogger, logThought } from './utils/logger.js';
export * from './types/watcher.js';
