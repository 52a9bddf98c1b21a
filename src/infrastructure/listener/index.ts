export { SyslogListener } from './syslog-listener.js';
export type { SyslogListenerOptions, ListenerTls, ListenerStats } from './syslog-listener.js';
export { LineSplitter, DEFAULT_MAX_LINE_BYTES } from './line-splitter.js';
