// ---------------------------------------------------------------------------
// Application identity
// ---------------------------------------------------------------------------

export const APP_NAME = 'proxyscout';
export const APP_VERSION = '0.4.0';

// ---------------------------------------------------------------------------
// Run defaults
// ---------------------------------------------------------------------------

/** Port scanned in range mode and assumed for bare addresses in file mode. */
export const DEFAULT_PORT = 7890;

export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;
