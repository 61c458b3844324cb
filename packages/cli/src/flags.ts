import {
  ConfigurationError,
  type HarnessOptions,
  type GeneratorOptions,
} from '@platcheck/core';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  seed?: string;
  runs?: string;
  maxDiscards?: string;
  maxConsecutiveDiscards?: string;
  maxShrinkSteps?: string;
  maxDepth?: string;
  // Commander sets color=false when --no-color is used
  color?: boolean;
  debugConfig?: boolean;
  json?: boolean;
}

/** Numeric flags with the option key each one sets. */
const NUMERIC_FLAGS = [
  ['seed', '--seed', 'seed'],
  ['runs', '--runs', 'numRuns'],
  ['maxDiscards', '--max-discards', 'maxDiscards'],
  [
    'maxConsecutiveDiscards',
    '--max-consecutive-discards',
    'maxConsecutiveDiscards',
  ],
  ['maxShrinkSteps', '--max-shrink-steps', 'maxShrinkSteps'],
] as const satisfies ReadonlyArray<
  readonly [
    keyof CliOptions,
    string,
    keyof Omit<HarnessOptions, 'generator'>,
  ]
>;

/**
 * Parse one integer flag value. Range checks are left to resolveOptions.
 */
export function parseIntegerFlag(
  flag: string,
  raw: string,
  setting: string
): number {
  const trimmed = raw.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new ConfigurationError(
      `Invalid ${flag} value "${raw}". Expected an integer.`,
      setting
    );
  }
  return Number(trimmed);
}

/**
 * Parse CLI options into a HarnessOptions record. Flags left unset stay
 * undefined so the defaults apply.
 */
export function parseHarnessOptions(options: CliOptions): HarnessOptions {
  const harness: HarnessOptions = {};

  for (const [key, flag, setting] of NUMERIC_FLAGS) {
    const raw = options[key];
    if (typeof raw === 'string') {
      harness[setting] = parseIntegerFlag(flag, raw, setting);
    }
  }

  if (typeof options.maxDepth === 'string') {
    const generator: GeneratorOptions = {
      maxDepth: parseIntegerFlag(
        '--max-depth',
        options.maxDepth,
        'generator.maxDepth'
      ),
    };
    harness.generator = generator;
  }

  return harness;
}

/**
 * Colors are forced off by --no-color and otherwise left to the presenter.
 */
export function resolveColors(
  options: Pick<CliOptions, 'color'>
): boolean | undefined {
  return options.color === false ? false : undefined;
}
