#!/usr/bin/env node

// CLI entry point
// - Command name: `platcheck` with subcommands `run` (default) and `check`.
// - `run` builds a PropertyRunner over platformCodec from the numeric flags and prints a
//   report: a one-line summary on pass, counterexample and shrunk reproducer on failure.
// - `check` runs the round-trip oracle once per platform string given on the command line.
// Exit codes come from the error classes in @platcheck/core (0 when nothing failed).

import { Command, CommanderError } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  PropertyRunner,
  checkRoundTrip,
  platformCodec,
  toPlatcheckError,
  type PlatformCodec,
  type RunReport,
  type SerializedError,
} from '@platcheck/core';
import { renderCLIView, renderReport, reportToJSON } from './render.js';
import { parseHarnessOptions, resolveColors, type CliOptions } from './flags.js';

type CheckResult =
  | { candidate: string; kind: 'pass'; serialized: string }
  | { candidate: string; kind: 'expected-rejection'; reason: string }
  | { candidate: string; kind: 'failure'; error: SerializedError };

function exitCodeOf(report: RunReport): number {
  return report.status === 'passed' ? 0 : report.error.getExitCode();
}

export function runHarness<D>(
  options: CliOptions,
  codec: PlatformCodec<D>
): number {
  const runner = new PropertyRunner(codec, parseHarnessOptions(options));

  if (options.debugConfig) {
    process.stderr.write(
      `[platcheck] effective config: ${JSON.stringify(runner.options, null, 2)}\n`
    );
  }

  const report = runner.run();
  const presenter = new ErrorPresenter({ colors: resolveColors(options) });

  if (options.json) {
    process.stdout.write(
      JSON.stringify(reportToJSON(report, presenter), null, 2) + '\n'
    );
  } else if (report.status === 'passed') {
    process.stdout.write(renderReport(report, presenter) + '\n');
  } else {
    process.stderr.write(renderReport(report, presenter) + '\n');
  }

  return exitCodeOf(report);
}

export function checkPlatforms(
  platforms: string[],
  options: Pick<CliOptions, 'color' | 'json'>
): number {
  const presenter = new ErrorPresenter({ colors: resolveColors(options) });
  const results: CheckResult[] = [];
  let exitCode = 0;

  for (const candidate of platforms) {
    try {
      const verdict = checkRoundTrip(candidate, platformCodec);
      results.push(
        verdict.kind === 'pass'
          ? { candidate, kind: 'pass', serialized: verdict.serialized }
          : { candidate, kind: 'expected-rejection', reason: verdict.reason }
      );
      if (!options.json) {
        process.stdout.write(
          verdict.kind === 'pass'
            ? `✅ ${JSON.stringify(candidate)} → ${verdict.serialized}\n`
            : `➖ ${JSON.stringify(candidate)} rejected: ${verdict.reason}\n`
        );
      }
    } catch (err: unknown) {
      const error = toPlatcheckError(err);
      if (exitCode === 0) exitCode = error.getExitCode();
      results.push({
        candidate,
        kind: 'failure',
        error: presenter.formatForJSON(error),
      });
      if (!options.json) {
        process.stderr.write(
          renderCLIView(presenter.formatForCLI(error)) + '\n'
        );
      }
    }
  }

  if (options.json) {
    process.stdout.write(JSON.stringify(results, null, 2) + '\n');
  }
  return exitCode;
}

export function createProgram(onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name('platcheck')
    .description('Round-trip property checks for platform identifier strings')
    .version('0.1.0')
    .exitOverride();

  program
    .command('run', { isDefault: true })
    .description('Run the round-trip property over generated platform strings')
    .option('--seed <number>', 'Deterministic seed (default 424242)')
    .option('--runs <number>', 'Passing trials required (default 2000)')
    .option('--max-discards <number>', 'Total expected rejections allowed')
    .option(
      '--max-consecutive-discards <number>',
      'Expected rejections allowed in a row'
    )
    .option(
      '--max-shrink-steps <number>',
      'Oracle calls spent shrinking a failure'
    )
    .option('--max-depth <number>', 'Fragment tree depth (0-6)')
    .option('--no-color', 'Disable ANSI colors')
    .option('--debug-config', 'Print effective configuration to stderr')
    .option('--json', 'Print the report as JSON')
    .action((options: CliOptions) => {
      onExit(runHarness(options, platformCodec));
    });

  program
    .command('check')
    .description('Run the round-trip oracle on the given platform strings')
    .argument('<platforms...>', 'Platform strings to check')
    .option('--no-color', 'Disable ANSI colors')
    .option('--json', 'Print the verdicts as JSON')
    .action((platforms: string[], options: CliOptions) => {
      onExit(checkPlatforms(platforms, options));
    });

  return program;
}

function handleCliError(err: unknown): number {
  // Commander has already printed usage errors, help and version output
  if (err instanceof CommanderError) return err.exitCode;

  const error = toPlatcheckError(err);
  const presenter = new ErrorPresenter();
  process.stderr.write(renderCLIView(presenter.formatForCLI(error)) + '\n');
  return error.getExitCode();
}

export async function main(argv: string[] = process.argv): Promise<number> {
  let exitCode = 0;
  const program = createProgram((code) => {
    exitCode = code;
  });
  try {
    await program.parseAsync(argv);
  } catch (err: unknown) {
    exitCode = handleCliError(err);
  }
  return exitCode;
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  process.exitCode = await main();
}
