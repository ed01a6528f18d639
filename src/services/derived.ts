import type { Reading } from '../types/registers.js';

/**
 * Metrics computed from other readings of the same cycle. Only Cosphi for
 * now: active over apparent power, when the latter is positive.
 */
export function deriveReadings(readings: readonly Reading[]): Reading[] {
  const byLabel = new Map<string, Map<string, number>>();
  for (const reading of readings) {
    const values = byLabel.get(reading.deviceLabel) ?? new Map<string, number>();
    values.set(reading.metricName, reading.value);
    byLabel.set(reading.deviceLabel, values);
  }

  const derived: Reading[] = [];
  for (const [deviceLabel, values] of byLabel) {
    const power = values.get('Power');
    const apparent = values.get('ApparentPower');
    if (power !== undefined && apparent !== undefined && apparent > 0) {
      derived.push({ deviceLabel, metricName: 'Cosphi', value: power / apparent });
    }
  }
  return derived;
}
