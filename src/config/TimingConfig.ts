/**
 * Centralized timing constants.
 */

/** Upper bound on a single wait for the next input event (~60 Hz) */
export const INPUT_POLL_INTERVAL_MS = Math.round(1000 / 60);
