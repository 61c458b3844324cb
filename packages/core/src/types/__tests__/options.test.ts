import { describe, it, expect } from 'vitest';
import {
  resolveOptions,
  DEFAULT_HARNESS_OPTIONS,
  type HarnessOptions,
} from '../options.js';
import { ConfigurationError } from '../errors.js';

describe('HarnessOptions', () => {
  describe('resolveOptions defaulting behavior', () => {
    it('should apply all defaults when no options provided', () => {
      const resolved = resolveOptions();

      expect(resolved.seed).toBe(424242);
      expect(resolved.numRuns).toBe(2000);
      expect(resolved.maxDiscards).toBe(100_000);
      expect(resolved.maxConsecutiveDiscards).toBe(100_000);
      expect(resolved.maxShrinkSteps).toBe(10_000);
      expect(resolved.generator).toEqual({
        maxFragments: 5,
        maxChildren: 4,
        maxDepth: 4,
      });
    });

    it('should deep merge the generator record', () => {
      const resolved = resolveOptions({ generator: { maxDepth: 2 } });

      expect(resolved.generator).toEqual({
        maxFragments: 5,
        maxChildren: 4,
        maxDepth: 2,
      });
    });

    it('should not mutate the defaults', () => {
      resolveOptions({ numRuns: 5, generator: { maxChildren: 1 } });

      expect(DEFAULT_HARNESS_OPTIONS.numRuns).toBe(2000);
      expect(DEFAULT_HARNESS_OPTIONS.generator.maxChildren).toBe(4);
    });
  });

  describe('validation', () => {
    const invalid: Array<[HarnessOptions, string]> = [
      [{ numRuns: 0 }, 'numRuns'],
      [{ numRuns: 1.5 }, 'numRuns'],
      [{ maxDiscards: -1 }, 'maxDiscards'],
      [{ maxConsecutiveDiscards: Number.NaN }, 'maxConsecutiveDiscards'],
      [{ maxShrinkSteps: -3 }, 'maxShrinkSteps'],
      [{ seed: 2 ** 40 }, 'seed'],
      [{ generator: { maxChildren: 5 } }, 'generator.maxChildren'],
      [{ generator: { maxDepth: 7 } }, 'generator.maxDepth'],
      [{ generator: { maxFragments: 9 } }, 'generator.maxFragments'],
    ];

    it.each(invalid)('rejects %j', (options, setting) => {
      let caught: unknown;
      try {
        resolveOptions(options);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ConfigurationError);
      if (caught instanceof ConfigurationError) {
        expect(caught.setting).toBe(setting);
      }
    });

    it('names the range in the message', () => {
      expect(() => resolveOptions({ numRuns: 0 })).toThrow(
        'numRuns must be an integer >= 1, got 0'
      );
      expect(() => resolveOptions({ generator: { maxDepth: 7 } })).toThrow(
        'generator.maxDepth must be an integer in [0, 6], got 7'
      );
    });

    it('accepts zero limits', () => {
      const resolved = resolveOptions({
        maxDiscards: 0,
        maxConsecutiveDiscards: 0,
        maxShrinkSteps: 0,
      });
      expect(resolved.maxDiscards).toBe(0);
    });
  });
});
