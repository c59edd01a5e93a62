export { DeckWatcher, InFlightSet, DEFAULT_WATCH_OPTIONS, createWatcher } from './DeckWatcher.js';
export type { DeckWatcherConfig } from './DeckWatcher.js';
