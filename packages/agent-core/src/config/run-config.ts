/**
 * Run configuration loading.
 *
 * The serialisable part of the run options (turn budget, hook policy,
 * timeouts, log level) can live in a YAML file next to the application.
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYAML } from 'yaml';
import {
  ConfigError,
  RunConfigSchema,
  errorMessage,
  formatZodIssues,
  type RunConfigValues,
} from '@turnkit/agent-contracts';

/**
 * Validate run configuration, applying defaults.
 * @throws ConfigError listing every invalid field
 */
export function parseRunConfig(data: unknown, source = 'run options'): RunConfigValues {
  const result = RunConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}:\n${formatZodIssues(result.error)}`, result.error);
  }
  return result.data;
}

/**
 * Load and validate a YAML run configuration file.
 * An empty file yields the defaults.
 */
export async function loadRunConfig(path: string): Promise<RunConfigValues> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to read ${path}: ${errorMessage(error)}`, error);
  }

  let data: unknown;
  try {
    data = parseYAML(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${path}: ${errorMessage(error)}`, error);
  }

  return parseRunConfig(data ?? {}, path);
}
