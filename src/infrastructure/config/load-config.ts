import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml, YAMLParseError } from 'yaml';
import type { Rule } from '../../domain/index.js';
import { ConfigError } from '../../domain/index.js';
import type { GlobalConfig } from '../../application/index.js';
import { compileRules, configDocumentSchema } from '../../application/index.js';

export const DEFAULT_CONFIG_PATH = 'logrelay.yml';

/** Validated settings plus the compiled, immutable rule list. */
export interface RelayConfig {
  readonly global: GlobalConfig;
  readonly rules: readonly Rule[];
}

/**
 * Parses and validates a YAML configuration document.
 *
 * Every failure (YAML syntax, schema violation, invalid rule) surfaces
 * as a `ConfigError`; nothing is defaulted past a broken document.
 */
export function parseConfig(text: string): RelayConfig {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (err: unknown) {
    if (err instanceof YAMLParseError) {
      throw ConfigError.at('', `YAML syntax error: ${err.message}`);
    }
    throw err;
  }

  const parsed = configDocumentSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }

  return {
    global: parsed.data.global,
    rules: compileRules(parsed.data.rules),
  };
}

/**
 * Loads configuration from a YAML file.
 *
 * Path resolution: explicit argument, then `LOGRELAY_CONFIG`, then
 * `logrelay.yml` in the working directory. A missing file is fatal.
 */
export function loadConfig(configPath?: string): RelayConfig {
  const filePath = resolve(
    process.cwd(),
    configPath ?? process.env['LOGRELAY_CONFIG'] ?? DEFAULT_CONFIG_PATH,
  );

  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw ConfigError.at('', `Cannot read ${filePath}: ${reason}`);
  }

  return parseConfig(text);
}
