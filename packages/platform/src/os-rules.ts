/**
 * Operating-system recognition rules.
 *
 * Rules are tried in order and the first one whose pattern occurs anywhere in
 * the input wins. Patterns never contain `-` outside of the optional
 * name/version separator, and versions never contain `-`, so a matched
 * `os-version` pair is recognized again by the same rule.
 */

export interface OsMatch {
  os: string;
  version: string | null;
}

interface OsRule {
  pattern: RegExp;
  /** Canonical os name; when absent the first capture group is the name. */
  os?: string;
}

// Capture layout: rules with a fixed `os` capture the version in group 1,
// rules without one capture the name in group 1 and the version in group 2.
const OS_RULES: readonly OsRule[] = [
  { pattern: /aix-?(\d+)?/, os: 'aix' },
  { pattern: /cygwin/, os: 'cygwin' },
  { pattern: /darwin-?(\d+)?/, os: 'darwin' },
  { pattern: /macruby-?(\d+(?:\.\d+)*)?/, os: 'macruby' },
  { pattern: /freebsd-?(\d+)?/, os: 'freebsd' },
  { pattern: /(?:java|jruby)-?(\d+(?:\.\d+)*)?/, os: 'java' },
  { pattern: /dalvik-?(\d+)?/, os: 'dalvik' },
  { pattern: /dotnet-?(\d+(?:\.\d+)*)?/, os: 'dotnet' },
  { pattern: /linux-?(\w+)?/, os: 'linux' },
  { pattern: /mingw32/, os: 'mingw32' },
  { pattern: /mingw-?(\w+)?/, os: 'mingw' },
  { pattern: /(mswin\d+)(?:[_-](\d+))?/ },
  { pattern: /netbsdelf/, os: 'netbsdelf' },
  { pattern: /openbsd-?(\d+\.\d+)?/, os: 'openbsd' },
  { pattern: /solaris-?(\d+\.\d+)?/, os: 'solaris' },
  { pattern: /wasi/, os: 'wasi' },
  { pattern: /(\w+_platform)-?(\d+)?/ },
];

export const UNKNOWN_OS = 'unknown';

export function matchOs(input: string): OsMatch {
  for (const rule of OS_RULES) {
    const match = rule.pattern.exec(input);
    if (!match) continue;

    if (rule.os !== undefined) {
      return { os: rule.os, version: match[1] ?? null };
    }
    const name = match[1];
    if (name === undefined) continue;
    return { os: name, version: match[2] ?? null };
  }
  return { os: UNKNOWN_OS, version: null };
}
