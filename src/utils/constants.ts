/**
 * Centralized constants for the tester
 */

// === Normalization ===
/** Compact JSON wider than this is re-emitted pretty-printed */
export const MAX_N_COLUMNS = 79;

// === Server I/O ===
/** How long drain waits for the first response byte, in ms */
export const DEFAULT_READ_TIMEOUT_MS = 1000;
/** Grace period before a lingering server process is killed, in ms */
export const SERVER_EXIT_GRACE_MS = 3000;

// === Test discovery ===
/** Extension of test script files found under a directory target */
export const TEST_FILE_EXTENSION = '.test';

// === Reporter ===
/** Terminal width used when COLUMNS and TERM_WIDTH are unset */
export const DEFAULT_TERM_WIDTH = 79;

// === Time Constants ===
/** Milliseconds per second */
export const MS_PER_SECOND = 1000;
