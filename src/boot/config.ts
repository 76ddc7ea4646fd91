import type { BmsAppConstants, BmsConfig, BmsUserConfig } from '$types/config';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Defaults for everything an operator might tune. The CLI
//   overlays environment variables on top of these.
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<BmsUserConfig> = {
  // CONTROLLER_ADDRESS
  //   Role: Host, host:port or URL of the controller's web panel.
  //   Critical: Non-empty, no embedded credentials.
  //   Recommended: A DHCP reservation; 192.168.0.200 is the factory address.
  CONTROLLER_ADDRESS: '192.168.0.200',

  // PROFILE
  //   Role: Firmware profile naming pages, decode plans, partitions and fences.
  //   Critical: One of the built-in profiles (s3-default, s3-strict).
  //   Recommended: s3-default unless near-fence readings clutter min/max.
  PROFILE: 's3-default',

  // REQUEST_TIMEOUT_MS
  //   Role: Per-page HTTP deadline.
  //   Critical: 0 (none) or 1–60000 ms.
  //   Recommended: 0 and let ABANDON_AFTER_MS drop stalled cycles.
  REQUEST_TIMEOUT_MS: 0,

  // POLL_RATE_MS
  //   Role: Minimum time between the starts of two poll cycles.
  //   Critical: 100–10000 ms (error outside).
  //   Recommended: 2000 ms; the panel itself refreshes about that often.
  POLL_RATE_MS: 2000,

  // ABANDON_AFTER_MS
  //   Role: Drop a cycle that has not finished after this long (0 = never).
  //   Critical: 0 or greater than POLL_RATE_MS (warning otherwise).
  //   Recommended: 0 on a healthy LAN; 10000 on flaky Wi-Fi.
  ABANDON_AFTER_MS: 0,

  // SANITIZE
  //   Role: Replace out-of-fence samples with the series average before statistics.
  //   Critical: Boolean only.
  //   Recommended: true for display; false to inspect raw controller output.
  SANITIZE: true,

  // VOLTAGE_FENCE / TEMPERATURE_FENCE
  //   Role: Override the profile's replacement fences (null keeps the profile's).
  //   Critical: lo <= hi, finite.
  //   Recommended: null; the profile fences suit LiFePO4 and NMC packs alike.
  VOLTAGE_FENCE: null,
  TEMPERATURE_FENCE: null,

  // CONSOLE_COLORS
  //   Role: Colorize log level tags.
  //   Critical: Boolean only.
  //   Recommended: true on a terminal; the CLI turns it off when stdout is piped.
  CONSOLE_COLORS: true,

  // GLOBAL_LOG_LEVEL
  //   Role: Minimum severity logged (0=DEBUG..3=CRITICAL).
  //   Critical: One of the LOG_LEVELS values.
  //   Recommended: 1 (INFO); 0 (DEBUG) shows every cycle start and harvest.
  GLOBAL_LOG_LEVEL: 1,

  // GLOBAL_LOG_AUTO_DEMOTE_HOURS
  //   Role: Hours after which INFO messages are suppressed (0 = never).
  //   Critical: 0–720 h.
  //   Recommended: 24 h for long-running monitors.
  GLOBAL_LOG_AUTO_DEMOTE_HOURS: 24,
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Internal limits that should rarely change.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<BmsAppConstants> = {
  // LOG_LEVELS
  //   Role: Canonical mapping of log level names to numeric codes.
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },

  // Poll rate bounds; below 100 ms the controller starts dropping requests
  MIN_POLL_RATE_MS: 100,
  MAX_POLL_RATE_MS: 10000,

  MAX_REQUEST_TIMEOUT_MS: 60000,
  MAX_DEMOTE_HOURS: 720,
};

export const LOG_LEVELS = APP_CONSTANTS.LOG_LEVELS;

// ─────────────────────────────────────────────────────────────
// COMBINED CONFIG (DEFAULT EXPORT)
// ─────────────────────────────────────────────────────────────

const CONFIG: BmsConfig = { ...APP_CONSTANTS, ...USER_CONFIG };

export default CONFIG;
