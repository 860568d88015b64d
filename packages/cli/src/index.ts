#!/usr/bin/env node

// CLI entry point
// - `semregex <constraint> [versions...]` prints the pattern for a version
//   constraint and, for each candidate version, whether it satisfies it.
// - --dialect / --not-equal map onto CompileOptions; --json switches stdout
//   to a single JSON document; --debug writes diagnostics to stderr.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  createMatcher,
  ErrorPresenter,
  InternalError,
  isSemregexError,
  parseConstraint,
  resolveOptions,
  type SemregexError,
} from '@semregex/core';
import { renderCLIView } from './render.js';
import {
  parseCompileOptions,
  resolveOutputFormat,
  type CliOptions,
} from './flags.js';
import { printDebug } from './debug.js';

interface MatchLine {
  version: string;
  matches: boolean;
}

function runConstraint(
  constraint: string,
  versions: string[],
  options: CliOptions
): void {
  const compileOptions = parseCompileOptions(options);
  if (options.debug) {
    printDebug('options', resolveOptions(compileOptions));
    printDebug('constraint', parseConstraint(constraint));
  }

  // Err.unwrap rethrows the SemregexError for handleCliError
  const matcher = createMatcher(constraint, compileOptions).unwrap();
  const { pattern } = matcher;
  if (options.debug) {
    printDebug('pattern', {
      length: pattern.source.length,
      negated: pattern.negated,
    });
  }

  const results: MatchLine[] = versions.map((version) => ({
    version,
    matches: matcher.test(version),
  }));

  if (resolveOutputFormat(options) === 'json') {
    process.stdout.write(
      JSON.stringify(
        {
          constraint: pattern.constraint,
          regex: pattern.source,
          negated: pattern.negated,
          dialect: pattern.dialect,
          results,
        },
        null,
        2
      ) + '\n'
    );
    return;
  }

  const lines = [
    `Version constraint: ${constraint}`,
    `Generated regex: ${pattern.source}`,
  ];
  if (pattern.negated) {
    lines.push('Negated: true (a match means the version is excluded)');
  }
  for (const { version, matches } of results) {
    lines.push(`  ${version}: ${matches}`);
  }
  process.stdout.write(lines.join('\n') + '\n');
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('semregex')
    .description('Compile a version constraint into a regular expression')
    .version('0.1.0')
    .argument('<constraint>', 'Version constraint, e.g. ">=1.2.3" or "[1.0,2.0)"')
    .argument('[versions...]', 'Candidate versions to test against the pattern')
    .option('--dialect <dialect>', 'Target regex engine: ecmascript|pcre|re2')
    .option('--not-equal <strategy>', 'Not-equal representation: lookahead|negate')
    .option('--json', 'Print the result as JSON', false)
    .option('--debug', 'Print diagnostics to stderr', false)
    .action(function (
      this: Command,
      constraint: string,
      versions: string[]
    ) {
      runConstraint(constraint, versions, this.opts<CliOptions>());
    });

  return program;
}

function handleCliError(program: Command, err: unknown): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env);

  let error: SemregexError;
  if (isSemregexError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalError({
      message: message || 'Unexpected error',
      cause: err instanceof Error ? err : undefined,
    });
  }

  if (resolveOutputFormat(program.opts<CliOptions>()) === 'json') {
    process.stderr.write(
      JSON.stringify(presenter.formatForJSON(error), null, 2) + '\n'
    );
  } else {
    console.error(renderCLIView(presenter.formatForCLI(error)));
  }

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  await program
    .parseAsync(argv)
    .catch((err: unknown) => handleCliError(program, err));
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
