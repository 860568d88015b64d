import {
  ConfigError,
  didYouMean,
  isNotEqualStrategy,
  isRegexDialect,
  NOT_EQUAL_STRATEGIES,
  REGEX_DIALECTS,
  type CompileOptions,
} from '@semregex/core';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  dialect?: string;
  notEqual?: string;
  json?: boolean;
  debug?: boolean;
  // Allow additional CLI options that we don't process
  [key: string]: unknown;
}

function invalidChoice(
  flag: string,
  setting: string,
  value: string,
  choices: readonly string[]
): ConfigError {
  const error = new ConfigError({
    message: `${flag} must be one of ${choices.join(', ')}`,
    setting,
    value,
  });
  const close = didYouMean(value.toLowerCase(), choices);
  error.suggestions =
    close.length > 0 ? close.map((choice) => `did you mean '${choice}'?`) : undefined;
  return error;
}

/**
 * Map parsed flags onto compile options. Flags left unset fall through to
 * the library defaults.
 *
 * @throws {ConfigError} For a dialect or strategy outside the supported set
 */
export function parseCompileOptions(options: CliOptions): CompileOptions {
  const compileOptions: CompileOptions = {};

  if (options.dialect !== undefined) {
    if (!isRegexDialect(options.dialect)) {
      throw invalidChoice('--dialect', 'dialect', options.dialect, REGEX_DIALECTS);
    }
    compileOptions.dialect = options.dialect;
  }

  if (options.notEqual !== undefined) {
    if (!isNotEqualStrategy(options.notEqual)) {
      throw invalidChoice(
        '--not-equal',
        'notEqual',
        options.notEqual,
        NOT_EQUAL_STRATEGIES
      );
    }
    compileOptions.notEqual = options.notEqual;
  }

  return compileOptions;
}

export type OutputFormat = 'text' | 'json';

export function resolveOutputFormat(options: CliOptions): OutputFormat {
  return options.json === true ? 'json' : 'text';
}
