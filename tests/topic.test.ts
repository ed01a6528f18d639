import { describe, it, expect } from 'vitest';
import { buildTopic, formatPayload } from '../src/services/topic.js';

const METRICS = [
  'Voltage/L1',
  'Voltage/L2',
  'Voltage/L3',
  'Current/L1',
  'Current/L2',
  'Current/L3',
  'Power',
  'ReactivePower',
  'ApparentPower',
  'Import',
  'Cosphi',
];

describe('buildTopic', () => {
  it('joins prefix, device label and metric', () => {
    expect(buildTopic('klskmp/metering/blitz', 'links', 'Voltage/L1')).toBe(
      'klskmp/metering/blitz/links/Voltage/L1'
    );
  });

  it('recovers the metric name from the topic', () => {
    const prefix = 'klskmp/metering/blitz';
    const topics = METRICS.map((metric) => buildTopic(prefix, 'rechts', metric));

    expect(new Set(topics).size).toBe(METRICS.length);
    topics.forEach((topic, idx) => {
      expect(topic.slice(`${prefix}/rechts/`.length)).toBe(METRICS[idx]);
    });
  });
});

describe('formatPayload', () => {
  it('keeps one decimal on whole numbers', () => {
    expect(formatPayload(3500)).toBe('3500.0');
    expect(formatPayload(0)).toBe('0.0');
    expect(formatPayload(-1)).toBe('-1.0');
  });

  it('prints fractional values as-is', () => {
    expect(formatPayload(230.5)).toBe('230.5');
    expect(formatPayload(0.75)).toBe('0.75');
  });
});
