/**
 * CLI exit codes. Printing actions is still a success.
 */
export const EXIT = {
  SUCCESS: 0,
  IO_ERROR: 1,
  INVALID_CONFIG: 2,
  INVALID_ARGS: 3,
} as const;
