import type {
  CLIErrorView,
  ErrorPresenter,
  RunReport,
  SerializedError,
} from '@platcheck/core';

// Minimal ANSI helpers (no external deps)
const ANSI = {
  reset: '\u001B[0m',
  red: '\u001B[31m',
  bold: '\u001B[1m',
};

function colorize(text: string, useColor: boolean, color: string): string {
  if (!useColor) return text;
  return `${color}${text}${ANSI.reset}`;
}

function wrapText(text: string, width: number): string {
  if (!text) return '';
  const words = text.split(/\s+/);
  const lines: string[] = [];
  let line = '';
  for (const word of words) {
    if ((line + (line ? ' ' : '') + word).length > width) {
      if (line) lines.push(line);
      line = word;
    } else {
      line = line ? `${line} ${word}` : word;
    }
  }
  if (line) lines.push(line);
  return lines.join('\n');
}

export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const lines: string[] = [];

  const title = `❌ ${view.title}`;
  lines.push(
    colorize(colorize(title, view.colors, ANSI.bold), view.colors, ANSI.red)
  );

  // Details carry aligned descriptor dumps; never rewrap them
  for (const detail of view.details) {
    lines.push(`   ${detail}`);
  }
  if (view.workaround) {
    lines.push(wrapText(`💡 Workaround: ${view.workaround}`, width));
  }

  return lines.join('\n');
}

/**
 * Human-readable run report. Failures show the generated counterexample and
 * the shrunk one, each with its own error view.
 */
export function renderReport(
  report: RunReport,
  presenter: ErrorPresenter
): string {
  switch (report.status) {
    case 'passed':
      return `✅ OK, passed ${report.passes} trials (${report.discards} discarded), seed ${report.seed}`;
    case 'failed':
      return [
        `❌ Falsified after ${report.trials} trials (seed ${report.seed})`,
        `Counterexample: ${JSON.stringify(report.counterexample.text)}`,
        renderCLIView(presenter.formatForCLI(report.originalError)),
        `Shrunk in ${report.shrinkSteps} steps: ${JSON.stringify(report.shrunk.text)}`,
        renderCLIView(presenter.formatForCLI(report.error)),
      ].join('\n');
    case 'exhausted':
      return renderCLIView(presenter.formatForCLI(report.error));
  }
}

export interface ReportJSON {
  status: RunReport['status'];
  seed: number;
  numRuns: number;
  trials: number;
  passes: number;
  discards: number;
  counterexample?: string;
  shrunk?: string;
  shrinkSteps?: number;
  originalError?: SerializedError;
  error?: SerializedError;
}

export function reportToJSON(
  report: RunReport,
  presenter: ErrorPresenter
): ReportJSON {
  const { status, seed, numRuns, trials, passes, discards } = report;
  const base: ReportJSON = { status, seed, numRuns, trials, passes, discards };
  switch (report.status) {
    case 'passed':
      return base;
    case 'failed':
      return {
        ...base,
        counterexample: report.counterexample.text,
        shrunk: report.shrunk.text,
        shrinkSteps: report.shrinkSteps,
        originalError: presenter.formatForJSON(report.originalError),
        error: presenter.formatForJSON(report.error),
      };
    case 'exhausted':
      return { ...base, error: presenter.formatForJSON(report.error) };
  }
}

export function stripAnsi(input: string): string {
  // Simple ANSI escape code stripper
  const ansiRe =
    /[\u001B\u009B][[\]()#;?]*(?:\d{1,4}(?:;\d{0,4})*)?[\dA-PR-TZcf-ntqry=><~]/g; // eslint-disable-line no-control-regex
  return input.replace(ansiRe, '');
}
