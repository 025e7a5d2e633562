/**
 * Public configuration exports: the option table and the runtime environment.
 *
 * @remarks
 * This module exists to centralize exports so other layers import from a
 * single stable path rather than reaching directly into the table file.
 */

export {
  type EnvironmentSources,
  HOME_ENV,
  HOME_PROPERTY,
  MODULE_PATH_ENV,
  MODULE_PATH_PROPERTY,
  type ProcessProperties,
  resolveEnvironment,
  type RuntimeEnvironment,
  STRUCTURED_LOGS_ENV,
} from './environment.ts';
export {
  findLongOption,
  findShortOption,
  OPTION_TABLE,
  type OptionMatch,
  type OptionName,
  type OptionSpec,
  takesValue,
} from './option-table.ts';
