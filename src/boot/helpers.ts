/**
 * Boot formatting helpers
 */

import type { FanConfig } from '$types';
import { sortControlPoints } from '@core/curve';
import type { ControlPoint, CurveSample } from '@core/curve';
import { toHexByte } from '@utils/number';

/**
 * Describe control points in ascending temperature order
 * @returns e.g. "30C:20 40C:25 55C:40"
 */
export function formatCurve(points: readonly ControlPoint[]): string {
  return sortControlPoints(points).map(function(point) {
    return point.temperature + 'C:' + point.dutyCycle;
  }).join(' ');
}

/**
 * One preview table row
 * @returns e.g. "   47.5 C   38  0x26"
 */
export function formatPreviewRow(sample: CurveSample): string {
  return sample.temperature.toFixed(1).padStart(7) + ' C  ' +
    String(sample.dutyCycle).padStart(3) + '  ' + toHexByte(sample.dutyCycle);
}

/**
 * Startup banner lines, logged once the sinks are ready
 */
export function formatStartupLines(config: FanConfig): string[] {
  const target = config.DRY_RUN
    ? 'DRY RUN'
    : 'IPMI ' + (config.IPMI_HOST === '' ? 'local' : config.IPMI_HOST);

  return [
    '🚀 Fan Curve Controller v1.0.0',
    '📈 ' + formatCurve(config.CURVE_POINTS) + ' | duty ' + config.DUTY_MIN + '-' + config.DUTY_MAX,
    '🌀 Banks: ' + config.FAN_BANK_COUNT +
      ' | Poll: ' + config.POLL_INTERVAL_SEC + 's' +
      ' | Debounce: ' + config.DEBOUNCE_THRESHOLD_C + 'C' +
      ' | ' + target +
      ' | Telemetry: ' + (config.TELEMETRY_ENABLED ? config.TELEMETRY_FILE_PATH : 'off')
  ];
}
