import type { Action, ConfigIssue, Matcher, Rule } from '../domain/index.js';
import {
  BUILTIN_VARIABLES,
  ConfigError,
  FIELD_NAMES,
  createForwardAction,
  createMergeAction,
  createPatternMatcher,
  createQueryMatcher,
  createReplaceAction,
  createStopAction,
} from '../domain/index.js';
import type { ActionConfig, RuleConfig } from './config-schema.js';

/**
 * Compiles validated rule configuration into immutable `Rule`s.
 *
 * Every problem across the whole list is collected first and reported
 * in one `ConfigError`, so an operator sees all broken rules at once.
 */
export function compileRules(configs: readonly RuleConfig[]): Rule[] {
  const rules: Rule[] = [];
  const issues: ConfigIssue[] = [];

  for (const [index, config] of configs.entries()) {
    const base = `rules.${index}`;
    const matcher = collect(issues, () => compileMatcher(config), matcherPath(base, config));
    if (matcher === undefined) continue;

    const allowed = new Set<string>([...BUILTIN_VARIABLES, ...FIELD_NAMES, ...matcher.captureNames]);
    const actions: Action[] = [];

    for (const [actionIndex, actionConfig] of config.actions.entries()) {
      const path = `${base}.actions.${actionIndex}`;
      const action = collect(issues, () => compileAction(actionConfig), path);
      if (action === undefined) continue;

      const unknown = action.variables.filter((name) => !allowed.has(name));
      if (unknown.length > 0) {
        issues.push({
          path,
          message: `Unknown placeholder ${unknown.map((n) => `{{${n}}}`).join(', ')}`,
        });
        continue;
      }
      actions.push(action);
    }

    rules.push({ matcher, actions });
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
  return rules;
}

function compileMatcher(config: RuleConfig): Matcher {
  if (config.jmespath !== undefined) {
    return createQueryMatcher(config.jmespath, config.field);
  }
  if (config.regex !== undefined) {
    return createPatternMatcher(config.regex, config.field);
  }
  // Unreachable after schema validation
  throw ConfigError.at('', 'Exactly one of "jmespath" or "regex" is required');
}

function compileAction(config: ActionConfig): Action {
  switch (config.type) {
    case 'merge':
      return createMergeAction(config.json);
    case 'stop':
      return createStopAction();
    case 'forward':
      return createForwardAction(config.topic);
    case 'replace':
      return createReplaceAction(config.template);
  }
}

function matcherPath(base: string, config: RuleConfig): string {
  return config.jmespath !== undefined ? `${base}.jmespath` : `${base}.regex`;
}

/** Runs `build`, turning a `ConfigError` into issues under `path`. */
function collect<T>(issues: ConfigIssue[], build: () => T, path: string): T | undefined {
  try {
    return build();
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      issues.push(...err.prefixed(path).issues);
      return undefined;
    }
    throw err;
  }
}
