export { Dispatcher } from './dispatcher.js';
export type { DispatcherOptions, BackoffOptions } from './dispatcher.js';
export type { Sink, DispatcherStats } from './types.js';
