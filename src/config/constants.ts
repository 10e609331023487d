/**
 * Centralized constants for the device tracker.
 * Avoids magic numbers scattered across the codebase.
 */

// ============================================================
// TIMING CONSTANTS (milliseconds)
// ============================================================

export const TIMING = {
    /** Wait for the login form to render */
    LOGIN_FORM_TIMEOUT: 15000,

    /** Wait for the session cookie after submitting credentials */
    SESSION_COOKIE_TIMEOUT: 10000,

    /** Poll interval while waiting for the session cookie */
    COOKIE_POLL_INTERVAL: 250,

    /** Wait for the device table on the fallback page */
    DEVICE_TABLE_TIMEOUT: 15000,

    /** Navigation timeout for admin pages */
    NAVIGATION_TIMEOUT: 30000,

    /** Per-keystroke pause range for human-like typing */
    KEYSTROKE_DELAY_MIN: 50,
    KEYSTROKE_DELAY_MAX: 200,

    /** Pause after finishing a field */
    FIELD_SETTLE_DELAY: 300,
} as const;

// ============================================================
// ROUTER UI
// ============================================================

export const SELECTORS = {
    LOGIN_FORM: 'form#loginform',
    USERNAME_INPUT: '#username',
    PASSWORD_INPUT: '#password',
    LOGIN_BUTTON: '#loginBT',
} as const;

/** Cookie the firmware sets once a login succeeds */
export const SESSION_COOKIE = 'sid';

export const VIEWPORT = { width: 1920, height: 1080 } as const;

// ============================================================
// DEVICE RECORDS
// ============================================================

/** Cells in one device table row */
export const DEVICE_ROW_CELL_COUNT = 9;

export const LEASE_UNIT_SECONDS = {
    hour: 3600,
    min: 60,
    sec: 1,
} as const;

export const UNKNOWN_DEVICE_NAME = 'Unknown';

// ============================================================
// DEBUG SCENARIOS
// ============================================================

export const DEBUG_SCENARIOS = {
    LOGIN_FAILURE: 'login_failure',
    DEVICE_LIST_FAILURE: 'device_list_failure',
} as const;

export type DebugScenario = typeof DEBUG_SCENARIOS[keyof typeof DEBUG_SCENARIOS];
