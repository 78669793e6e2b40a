/**
 * CLI exit codes. Every failure class shares one code.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILURE: 1,
} as const;
