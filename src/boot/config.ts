import type { FanUserConfig, FanAppConstants, FanConfig } from '$types';
import { SIZE_CONSTANTS } from '@utils/constants';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Everything a user might reasonably tune for the curve,
//   the BMC link, telemetry, and observability.
//   Every key can be overridden from the environment (.env).
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<FanUserConfig> = {
  // CURVE_POINTS
  //   Role: Control points (temperature °C -> duty cycle) the curve interpolates between.
  //   Critical: At least one point, finite values, no duplicate temperatures.
  //   Recommended: Duty never falling as temperature rises; 4–6 points.
  //   Env: CURVE_POINTS="30:20,40:25,55:40,70:70,80:100"
  CURVE_POINTS: [
    { temperature: 30, dutyCycle: 20 },
    { temperature: 40, dutyCycle: 25 },
    { temperature: 55, dutyCycle: 40 },
    { temperature: 70, dutyCycle: 70 },
    { temperature: 80, dutyCycle: 100 },
  ],

  // DUTY_MIN / DUTY_MAX
  //   Role: Clamp applied to every evaluated duty cycle (BMC units, usually percent).
  //   Critical: Integers 0–255, DUTY_MIN ≤ DUTY_MAX.
  //   Recommended: DUTY_MIN 5–60 so fans never stall; DUTY_MAX 50–100.
  DUTY_MIN: 10,
  DUTY_MAX: 100,

  // DEBOUNCE_THRESHOLD_C
  //   Role: Temperature drift (°C) since the last applied command before fans are re-commanded.
  //   Critical: 0–20 °C.
  //   Recommended: 0.5–5 °C; 2 °C keeps fan noise steady under normal load swings.
  DEBOUNCE_THRESHOLD_C: 2,

  // POLL_INTERVAL_SEC
  //   Role: Pause between the end of one tick and the start of the next.
  //   Critical: 1–3600 s.
  //   Recommended: 2–60 s; 10 s is quick enough for CPU heat without hammering the BMC.
  POLL_INTERVAL_SEC: 10,

  // TEMP_SENSOR_NAMES
  //   Role: SDR sensor names to read (e.g. "CPU1 Temp"); empty reads every temperature sensor.
  //   Critical: None.
  //   Recommended: The CPU and system sensors that track the fans you control.
  TEMP_SENSOR_NAMES: [],

  // FAN_BANK_COUNT
  //   Role: Number of fan zones; banks 1..FAN_BANK_COUNT all receive the same duty.
  //   Critical: Integer 1–8.
  //   Recommended: 2 on most boards (CPU zone + peripheral zone).
  FAN_BANK_COUNT: 2,

  // FAN_MODE_FULL_ON_START
  //   Role: Switch the BMC to full fan mode before the first tick.
  //   Critical: Boolean only.
  //   Recommended: true; most BMCs override manual duties in other modes.
  FAN_MODE_FULL_ON_START: true,

  // RESTORE_FAN_MODE_ON_EXIT
  //   Role: Hand fan control back to the BMC (optimal mode) on SIGINT/SIGTERM.
  //   Critical: Boolean only.
  //   Recommended: true so fans are never left at a fixed duty with nobody watching.
  RESTORE_FAN_MODE_ON_EXIT: true,

  // DRY_RUN
  //   Role: Log fan commands instead of sending them; sensors are still read.
  //   Critical: Boolean only.
  //   Recommended: true for the first run on a new board.
  DRY_RUN: false,

  // IPMI_TOOL_PATH
  //   Role: ipmitool executable (name on PATH or absolute path).
  //   Critical: Non-empty.
  IPMI_TOOL_PATH: 'ipmitool',

  // IPMI_HOST / IPMI_USER / IPMI_PASSWORD
  //   Role: Remote BMC reached over lanplus; empty host uses the local interface.
  //   Critical: IPMI_USER required when IPMI_HOST is set.
  //   Recommended: Keep the password in .env, never in this file.
  IPMI_HOST: '',
  IPMI_USER: '',
  IPMI_PASSWORD: '',

  // IPMI_TIMEOUT_MS
  //   Role: Kill an ipmitool call that has not finished after this long.
  //   Critical: 500–120000 ms.
  //   Recommended: Shorter than POLL_INTERVAL_SEC; 5000 ms covers slow remote BMCs.
  IPMI_TIMEOUT_MS: 5000,

  // TELEMETRY_ENABLED
  //   Role: Write the evaluated duty cycle to TELEMETRY_FILE_PATH every tick.
  //   Critical: Boolean only.
  TELEMETRY_ENABLED: false,

  // TELEMETRY_FILE_PATH / TELEMETRY_MEASUREMENT / TELEMETRY_HOSTNAME
  //   Role: Line-protocol file picked up by a collector, its measurement name and host tag.
  //   Critical: Non-empty when TELEMETRY_ENABLED = true.
  //   Recommended: A tmpfs path such as /run/fan-curve/duty.influx.
  TELEMETRY_FILE_PATH: '',
  TELEMETRY_MEASUREMENT: 'fan_curve',
  TELEMETRY_HOSTNAME: 'localhost',

  // SLACK_ENABLED
  //   Role: Master switch for Slack notifications.
  //   Critical: Boolean only.
  //   Recommended: true when the server is monitored remotely.
  SLACK_ENABLED: false,

  // SLACK_LOG_LEVEL
  //   Role: Minimum log severity sent to Slack (0=DEBUG..3=CRITICAL).
  //   Critical: Must be one of the LOG_LEVELS values.
  //   Recommended: 2 (WARNING); fan changes at INFO are too chatty for a channel.
  SLACK_LOG_LEVEL: 2,

  // SLACK_WEBHOOK_URL
  //   Role: Incoming webhook URL.
  //   Critical: http(s) URL when SLACK_ENABLED = true, otherwise Slack stays off.
  //   Recommended: Set from .env only.
  SLACK_WEBHOOK_URL: '',

  // SLACK_BUFFER_SIZE
  //   Role: Maximum number of buffered Slack messages.
  //   Critical: 1–1000.
  //   Recommended: 10–50.
  SLACK_BUFFER_SIZE: 20,

  // SLACK_RETRY_DELAY_SEC
  //   Role: Initial delay (s) before retrying a failed Slack send; doubles per retry.
  //   Critical: 0.1–3600 s.
  //   Recommended: 5–30 s.
  SLACK_RETRY_DELAY_SEC: 10,

  // CONSOLE_ENABLED
  //   Role: Master switch for console logging.
  //   Critical: Boolean only.
  //   Recommended: true (journald picks up stdout).
  CONSOLE_ENABLED: true,

  // CONSOLE_LOG_LEVEL
  //   Role: Minimum log severity sent to the console (0=DEBUG..3=CRITICAL).
  //   Critical: Must be one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO) for normal operation.
  CONSOLE_LOG_LEVEL: 1,

  // CONSOLE_BUFFER_SIZE
  //   Role: Maximum number of queued console log lines.
  //   Critical: 1–10000.
  //   Recommended: 100–500.
  CONSOLE_BUFFER_SIZE: 150,

  // CONSOLE_INTERVAL_MS
  //   Role: Interval between draining queued console lines in ms.
  //   Critical: 1–10000 ms.
  //   Recommended: 10–50 ms.
  CONSOLE_INTERVAL_MS: 10,

  // GLOBAL_LOG_LEVEL
  //   Role: Master log verbosity (0=DEBUG..3=CRITICAL); DEBUG also enables per-tick trace lines.
  //   Critical: Must match one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO), 0 (DEBUG) only while tuning the curve.
  GLOBAL_LOG_LEVEL: 1,

  // GLOBAL_LOG_AUTO_DEMOTE_HOURS
  //   Role: Hours after which INFO lines are suppressed (0 disables demotion).
  //   Critical: 0–8760 h.
  //   Recommended: 24 h; routine fan changes stop flooding the journal after a day.
  GLOBAL_LOG_AUTO_DEMOTE_HOURS: 24,
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Internal engine constants that should rarely change,
//   unless porting to a different BMC family.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<FanAppConstants> = {
  // LOG_LEVELS
  //   Role: Canonical mapping of log level names to numeric codes.
  //   Critical: Values must be distinct; *_LOG_LEVEL settings must use these.
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },

  // MAX_CONSECUTIVE_ERRORS
  //   Role: Consecutive failed ticks (sampling, actuation or unexpected) before warnings escalate to critical.
  //   Recommended: 3–5.
  MAX_CONSECUTIVE_ERRORS: 3,

  // SLACK_MAX_RETRIES
  //   Role: Send attempts per Slack message before it is dropped.
  SLACK_MAX_RETRIES: 5,

  // SENSOR_MIN_VALID_C / SENSOR_MAX_VALID_C
  //   Role: Plausibility range for SDR readings; anything outside is treated as a bad channel.
  //   Recommended: Do not change; covers every rated operating range of server sensors.
  SENSOR_MIN_VALID_C: -55,
  SENSOR_MAX_VALID_C: 150,

  // IPMI_SDR_TEMPERATURE_ARGS
  //   Role: ipmitool arguments listing temperature sensors.
  IPMI_SDR_TEMPERATURE_ARGS: ['sdr', 'type', 'temperature'],

  // IPMI_FAN_DUTY_PREFIX
  //   Role: Raw command preceding <zone> <duty> (Supermicro X10/X11 zone duty).
  IPMI_FAN_DUTY_PREFIX: ['raw', '0x30', '0x70', '0x66', '0x01'],

  // IPMI_FAN_FIRST_ZONE
  //   Role: BMC zone byte for bank 1; bank n goes to IPMI_FAN_FIRST_ZONE + n - 1.
  //   Recommended: 0 on Supermicro (zone 0 = CPU, zone 1 = peripheral).
  IPMI_FAN_FIRST_ZONE: 0,

  // IPMI_FAN_MODE_PREFIX
  //   Role: Raw command preceding <mode> (Supermicro fan mode set).
  IPMI_FAN_MODE_PREFIX: ['raw', '0x30', '0x45', '0x01'],

  // IPMI_MAX_BUFFER_BYTES
  //   Role: Largest stdout/stderr accepted from one ipmitool call.
  IPMI_MAX_BUFFER_BYTES: SIZE_CONSTANTS.BYTES_PER_MIB,
};

// ─────────────────────────────────────────────────────────────
// COMBINED CONFIG (DEFAULT EXPORT)
//   Defaults only; boot applies environment and CLI overrides on top
// ─────────────────────────────────────────────────────────────

const CONFIG: FanConfig = { ...APP_CONSTANTS, ...USER_CONFIG };

export default CONFIG;
