import { matchOs } from './os-rules.js';

export const PLATFORM_SEPARATOR = '-';

/**
 * Raised when a string cannot be read as a platform at all.
 */
export class PlatformError extends Error {
  constructor(
    message: string,
    public readonly input: string
  ) {
    super(message);
    this.name = 'PlatformError';
  }
}

export type PlatformTuple = readonly [
  cpu: string | null,
  os: string,
  version: string | null,
];

const LEGACY_X86_OS = /^mswin\d*32$/;
const X86_ALIAS = /i\d86/;

function normalizeCpu(cpu: string): string {
  return X86_ALIAS.test(cpu) ? 'x86' : cpu;
}

/**
 * A build target: CPU architecture, operating system and OS version.
 *
 * `Platform.parse` and `toString` are inverse on parsed values:
 * `Platform.parse(p.toString())` equals `p` for every `p` that `parse`
 * returned.
 */
export class Platform {
  private constructor(
    public readonly cpu: string | null,
    public readonly os: string,
    public readonly version: string | null
  ) {}

  static of(
    cpu: string | null,
    os: string,
    version: string | null = null
  ): Platform {
    return new Platform(cpu, os, version);
  }

  /**
   * Reads `cpu-os[-version]`, or a bare os name.
   *
   * @throws {PlatformError} when the cpu field is empty
   */
  static parse(input: string): Platform {
    const trimmed = input.replace(/-+$/, '');
    if (trimmed === '' || trimmed.startsWith(PLATFORM_SEPARATOR)) {
      throw new PlatformError(
        `empty cpu in platform ${JSON.stringify(input)}`,
        input
      );
    }

    const at = trimmed.indexOf(PLATFORM_SEPARATOR);
    if (at === -1) {
      // A bare token names an operating system only.
      const { os } = matchOs(trimmed);
      return new Platform(LEGACY_X86_OS.test(os) ? 'x86' : null, os, null);
    }

    const cpu = normalizeCpu(trimmed.slice(0, at));
    const { os, version } = matchOs(trimmed.slice(at + 1));
    return new Platform(cpu, os, version);
  }

  toArray(): PlatformTuple {
    return [this.cpu, this.os, this.version];
  }

  toString(): string {
    return this.toArray()
      .filter((part): part is string => part !== null)
      .join(PLATFORM_SEPARATOR);
  }

  equals(other: Platform): boolean {
    return (
      this.cpu === other.cpu &&
      this.os === other.os &&
      this.version === other.version
    );
  }

  inspect(): string {
    const show = (value: string | null): string =>
      value === null ? 'null' : JSON.stringify(value);
    return `#<Platform cpu=${show(this.cpu)} os=${show(this.os)} version=${show(this.version)}>`;
  }
}
