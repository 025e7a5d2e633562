/**
 * Runtime Environment
 *
 * Role:
 *   Resolve the home directory and module search path handed to the engine.
 *
 * Each setting is looked up as a process property first (passed in by the
 * embedding entrypoint), then as an environment variable.
 */

import path from 'node:path';

export const HOME_PROPERTY = 'spindle.home';
export const HOME_ENV = 'SPINDLE_HOME';
export const MODULE_PATH_PROPERTY = 'spindle.modulepath';
export const MODULE_PATH_ENV = 'SPINDLE_MODULE_PATH';
export const STRUCTURED_LOGS_ENV = 'SPINDLE_STRUCTURED_LOGS';

export type ProcessProperties = Readonly<Record<string, string | undefined>>;

export interface RuntimeEnvironment {
  readonly home: string;
  readonly modulePath: readonly string[];
  readonly structuredLogs: boolean;
}

export interface EnvironmentSources {
  readonly properties?: ProcessProperties;
  readonly env?: NodeJS.ProcessEnv;
  /** Separator for the module path list (defaults to the platform delimiter) */
  readonly delimiter?: string;
}

function lookup(
  property: string,
  variable: string,
  properties: ProcessProperties,
  env: NodeJS.ProcessEnv,
): string | undefined {
  return properties[property] ?? env[variable];
}

/**
 * Resolve the runtime environment from properties and environment variables.
 */
export function resolveEnvironment(sources: EnvironmentSources = {}): RuntimeEnvironment {
  const { properties = {}, env = process.env, delimiter = path.delimiter } = sources;

  const home = lookup(HOME_PROPERTY, HOME_ENV, properties, env) ?? '.';
  const rawModulePath = lookup(MODULE_PATH_PROPERTY, MODULE_PATH_ENV, properties, env);
  const modulePath =
    rawModulePath === undefined
      ? []
      : rawModulePath.split(delimiter).filter((entry) => entry.length > 0);

  return {
    home,
    modulePath,
    structuredLogs: env[STRUCTURED_LOGS_ENV] === '1',
  };
}
