import { describe, it, expect } from 'vitest';
import * as render from './render.js';
import {
  ErrorCode,
  ErrorPresenter,
  GeneratorExhaustedError,
  RoundTripMismatchError,
  toCandidate,
  type CLIErrorView,
  type FailedRun,
  type ExhaustedRun,
} from '@platcheck/core';
import {
  renderCLIView,
  renderReport,
  reportToJSON,
  stripAnsi,
} from './render.js';

const presenter = new ErrorPresenter({ colors: false, terminalWidth: 80 });

function mismatch(
  candidate: string,
  text: string,
  before: string,
  after: string
): RoundTripMismatchError {
  return new RoundTripMismatchError({
    candidate,
    expected: { text, debug: before },
    actual: { text, debug: after },
  });
}

describe('renderCLIView', () => {
  it('renders the title and indents details verbatim', () => {
    const view: CLIErrorView = {
      title: 'Error E101: Round trip changed the platform',
      code: ErrorCode.ROUND_TRIP_MISMATCH,
      details: ['From      "x"', 'Expected: A'],
      colors: false,
      terminalWidth: 80,
    };

    expect(renderCLIView(view)).toBe(
      [
        '❌ Error E101: Round trip changed the platform',
        '   From      "x"',
        '   Expected: A',
      ].join('\n')
    );
  });

  it('wraps the workaround to the terminal width', () => {
    const view: CLIErrorView = {
      title: 'Error E300: bad flag',
      code: ErrorCode.CONFIGURATION_ERROR,
      details: [],
      workaround: 'Use a smaller value here please',
      colors: false,
      terminalWidth: 20,
    };

    expect(renderCLIView(view)).toBe(
      [
        '❌ Error E300: bad flag',
        '💡 Workaround: Use a',
        'smaller value here',
        'please',
      ].join('\n')
    );
  });

  it('applies ANSI colors when enabled', () => {
    const view: CLIErrorView = {
      title: 'Error E500: Internal error',
      code: ErrorCode.INTERNAL_ERROR,
      details: [],
      colors: true,
      terminalWidth: 80,
    };
    const out = renderCLIView(view);

    expect(out.includes('\u001B[31m')).toBe(true);
    expect(stripAnsi(out)).toBe('❌ Error E500: Internal error');
  });
});

describe('renderReport', () => {
  it('summarizes a passing run', () => {
    const out = renderReport(
      {
        status: 'passed',
        seed: 7,
        numRuns: 3,
        trials: 4,
        passes: 3,
        discards: 1,
      },
      presenter
    );

    expect(out).toBe('✅ OK, passed 3 trials (1 discarded), seed 7');
  });

  it('shows both the counterexample and the shrunk reproducer', () => {
    const report: FailedRun = {
      status: 'failed',
      seed: 7,
      numRuns: 10,
      trials: 4,
      passes: 2,
      discards: 1,
      counterexample: toCandidate(['arm64', 'darwin', '20']),
      originalError: mismatch('arm64-darwin-20', 'arm64-darwin', 'A', 'B'),
      shrunk: toCandidate(['x86', 'linux1']),
      error: mismatch('x86-linux1', 'x86-linux', 'C', 'D'),
      shrinkSteps: 2,
    };

    expect(stripAnsi(renderReport(report, presenter)).split('\n')).toEqual([
      '❌ Falsified after 4 trials (seed 7)',
      'Counterexample: "arm64-darwin-20"',
      '❌ Error E101: Round trip changed the platform',
      '   From      "arm64-darwin-20"',
      '   Expected: A',
      '             arm64-darwin',
      '   Got:      B',
      '             arm64-darwin',
      'Shrunk in 2 steps: "x86-linux1"',
      '❌ Error E101: Round trip changed the platform',
      '   From      "x86-linux1"',
      '   Expected: C',
      '             x86-linux',
      '   Got:      D',
      '             x86-linux',
    ]);
  });
});

describe('reportToJSON', () => {
  it('serializes an exhausted run with its error', () => {
    const report: ExhaustedRun = {
      status: 'exhausted',
      seed: 1,
      numRuns: 5,
      trials: 3,
      passes: 0,
      discards: 3,
      error: new GeneratorExhaustedError({
        passes: 0,
        numRuns: 5,
        discards: 3,
        consecutiveDiscards: 3,
      }),
    };

    const json = reportToJSON(report, presenter);

    expect(json).toMatchObject({
      status: 'exhausted',
      seed: 1,
      trials: 3,
      discards: 3,
      error: {
        name: 'GeneratorExhaustedError',
        errorCode: ErrorCode.GENERATOR_EXHAUSTED,
      },
    });
    expect(json.error?.stack).toBeUndefined();
  });

  it('keeps only the counters for a passing run', () => {
    expect(
      reportToJSON(
        {
          status: 'passed',
          seed: 2,
          numRuns: 1,
          trials: 1,
          passes: 1,
          discards: 0,
        },
        presenter
      )
    ).toEqual({
      status: 'passed',
      seed: 2,
      numRuns: 1,
      trials: 1,
      passes: 1,
      discards: 0,
    });
  });
});

describe('stripAnsi', () => {
  it('removes color sequences', () => {
    expect(stripAnsi('\u001B[1m\u001B[31mred\u001B[0m\u001B[0m')).toBe('red');
  });
});

describe('render module', () => {
  it('exposes only named renderers', () => {
    expect(Object.keys(render).sort()).toEqual([
      'renderCLIView',
      'renderReport',
      'reportToJSON',
      'stripAnsi',
    ]);
  });
});
