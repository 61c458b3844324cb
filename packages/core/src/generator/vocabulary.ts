/**
 * Closed vocabularies the atom generator draws from. Valid names sit next to
 * malformed-but-plausible version tokens (doubled, leading and trailing dots).
 */

export const KNOWN_CPUS = [
  'x86',
  'x86_64',
  'arm',
  'arm64',
  'i386',
  'i486',
  'aarch64',
] as const;

export const KNOWN_PLATFORMS = [
  'linux',
  'darwin',
  'freebsd',
  'mingw',
  'mswin',
  'mswin64',
  'java',
  'jruby',
  'aix',
  'cygwin',
  'macruby',
  'dalvik',
  'dotnet',
  'mingw32',
  'openbsd',
  'solaris',
  'wasi',
  'test_platform',
] as const;

export const VERSION_LIKE = [
  '1',
  '1.0',
  '1..0',
  '1..',
  '.0',
  '1.',
  '..',
  '12299',
  'gnueabihf',
] as const;
