/**
 * A single problem found while loading configuration.
 * `path` is the dotted key path inside the document, e.g. `rules.2.regex`.
 */
export interface ConfigIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Fatal configuration problem. The daemon refuses to start rather than
 * run with a partially valid rule set.
 */
export class ConfigError extends Error {
  readonly issues: readonly ConfigIssue[];

  constructor(issues: readonly ConfigIssue[]) {
    super(
      `Invalid configuration: ${issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ')}`,
    );
    this.name = 'ConfigError';
    this.issues = issues;
  }

  static at(path: string, message: string): ConfigError {
    return new ConfigError([{ path, message }]);
  }

  /** Re-roots every issue under `prefix`, e.g. `rules.3.regex`. */
  prefixed(prefix: string): ConfigError {
    return new ConfigError(
      this.issues.map((i) => ({ path: i.path ? `${prefix}.${i.path}` : prefix, message: i.message })),
    );
  }
}

/** Raised by `Dispatcher.submit()` once shutdown has been signalled. */
export class DispatcherClosedError extends Error {
  constructor() {
    super('Dispatcher is closed, envelope not accepted');
    this.name = 'DispatcherClosedError';
  }
}
