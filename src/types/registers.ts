export const DATA_TYPES = [
  'uint16',
  'int16',
  'uint32',
  'int32',
  'float32',
  'uint64',
] as const;

export type DataType = (typeof DATA_TYPES)[number];

export interface MetricDefinition {
  readonly name: string;
  /** Charge point label, the middle segment of the topic. */
  readonly deviceLabel: string;
  readonly registerAddress: number;
  readonly registerCount: number;
  readonly dataType: DataType;
  readonly scale: number;
}

export interface Reading {
  deviceLabel: string;
  metricName: string;
  value: number;
}
