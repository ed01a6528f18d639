export function buildTopic(
  prefix: string,
  deviceLabel: string,
  metricName: string
): string {
  return `${prefix}/${deviceLabel}/${metricName}`;
}

/** Plain-text payload; whole numbers keep one decimal (3500 -> "3500.0"). */
export function formatPayload(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}
