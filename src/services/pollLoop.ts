import type { FieldBusClient, Publisher } from '../types/clients.js';
import type { MetricDefinition, Reading } from '../types/registers.js';
import { delay } from '../utils/delay.js';
import { DecodeError, errorMessage } from '../utils/errors.js';
import { logDebug, logError, logInfo } from '../utils/logger/index.js';
import {
  DEFAULT_RETRY_CONFIG,
  ReconnectionManager,
  type RetryConfig,
} from '../utils/reconnection.js';
import { decode } from './decoder.js';
import { deriveReadings } from './derived.js';
import type { RegisterMap } from './registerMap.js';
import { buildTopic, formatPayload } from './topic.js';

const COMPONENT = 'PollLoop';

export type PollState =
  | 'connecting'
  | 'polling'
  | 'publishing'
  | 'sleeping'
  | 'stopped';

export interface FailedMetric {
  deviceLabel: string;
  metricName: string;
  error: string;
}

export interface CycleReport {
  cycle: number;
  /** Date.now() when polling began. */
  startedAt: number;
  readings: Reading[];
  failed: FailedMetric[];
  /** Topics that were handed to the broker. */
  published: string[];
}

export interface PollLoopOptions {
  fieldBus: FieldBusClient;
  publisher: Publisher;
  registerMap: RegisterMap;
  topicPrefix: string;
  intervalMs: number;
  retry?: RetryConfig;
  onCycle?: (report: CycleReport) => void;
}

/**
 * Connect, read every register, publish every reading, sleep, repeat.
 * Reads and publishes run strictly one after another; a failure of one
 * metric never aborts the rest of the cycle.
 */
export class PollLoop {
  private currentState: PollState = 'stopped';
  private abortController = new AbortController();
  private cycle = 0;
  private readonly fieldBusReconnection: ReconnectionManager;
  private readonly publisherReconnection: ReconnectionManager;

  constructor(private readonly options: PollLoopOptions) {
    const retry = options.retry ?? DEFAULT_RETRY_CONFIG;
    this.fieldBusReconnection = new ReconnectionManager('ModbusService', retry, () =>
      options.fieldBus.connect()
    );
    this.publisherReconnection = new ReconnectionManager('MqttService', retry, () =>
      options.publisher.connect()
    );
  }

  public get state(): PollState {
    return this.currentState;
  }

  private get stopping(): boolean {
    return this.abortController.signal.aborted;
  }

  /**
   * Runs until `stop` is called. Both connections are released on every
   * exit path; errors that are not per-metric are rethrown afterwards.
   */
  public async run(): Promise<void> {
    if (this.currentState !== 'stopped') {
      throw new Error('Poll loop is already running');
    }
    const { signal } = this.abortController;

    try {
      this.currentState = 'connecting';
      if (!(await this.publisherReconnection.start(signal))) return;

      while (!this.stopping) {
        if (!this.options.fieldBus.isConnected) {
          this.currentState = 'connecting';
          if (!(await this.fieldBusReconnection.start(signal))) break;
        }

        const report = await this.runCycle();
        this.options.onCycle?.(report);
        if (this.stopping) break;

        this.currentState = 'sleeping';
        await delay(this.options.intervalMs, signal);
      }
    } finally {
      this.currentState = 'stopped';
      await this.release();
      this.abortController = new AbortController();
    }
  }

  /**
   * Stops at the next checkpoint; sleeps and backoff waits end at once.
   * Called before `run`, the next run releases and returns without polling.
   */
  public stop(): void {
    if (this.stopping) return;
    logInfo(COMPONENT, 'Stop requested', { state: this.currentState });
    this.abortController.abort();
  }

  private async runCycle(): Promise<CycleReport> {
    const cycle = ++this.cycle;
    const startedAt = Date.now();
    const failed: FailedMetric[] = [];

    this.currentState = 'polling';
    const readings = await this.readAll(failed);
    readings.push(...deriveReadings(readings));

    this.currentState = 'publishing';
    const published = await this.publishAll(readings, failed);

    this.logSummary(readings, published, failed);
    return { cycle, startedAt, readings, failed, published };
  }

  private async readAll(failed: FailedMetric[]): Promise<Reading[]> {
    const readings: Reading[] = [];

    for (const definition of this.options.registerMap.lookup()) {
      if (this.stopping) break;

      const value = await this.readMetric(definition, failed);
      if (value !== undefined) {
        readings.push({
          deviceLabel: definition.deviceLabel,
          metricName: definition.name,
          value,
        });
      }
    }
    return readings;
  }

  private async readMetric(
    definition: MetricDefinition,
    failed: FailedMetric[]
  ): Promise<number | undefined> {
    const context = {
      metric: definition.name,
      label: definition.deviceLabel,
      address: definition.registerAddress,
    };

    let raw: Buffer;
    try {
      raw = await this.options.fieldBus.readRegisters(
        definition.registerAddress,
        definition.registerCount
      );
    } catch (error) {
      logError(COMPONENT, `Error reading ${definition.name}`, error, context);
      failed.push({
        deviceLabel: definition.deviceLabel,
        metricName: definition.name,
        error: errorMessage(error),
      });
      return undefined;
    }

    try {
      return decode(raw, definition.dataType, definition.scale);
    } catch (error) {
      if (!(error instanceof DecodeError)) throw error;
      logError(COMPONENT, `Error decoding ${definition.name}`, error, context);
      failed.push({
        deviceLabel: definition.deviceLabel,
        metricName: definition.name,
        error: error.message,
      });
      return undefined;
    }
  }

  private async publishAll(
    readings: readonly Reading[],
    failed: FailedMetric[]
  ): Promise<string[]> {
    const published: string[] = [];

    for (const reading of readings) {
      if (this.stopping) break;

      const topic = buildTopic(
        this.options.topicPrefix,
        reading.deviceLabel,
        reading.metricName
      );
      const payload = formatPayload(reading.value);

      try {
        await this.options.publisher.publish(topic, payload);
        published.push(topic);
        logDebug(COMPONENT, 'Published', { topic, payload });
      } catch (error) {
        logError(COMPONENT, `Error publishing ${reading.metricName}`, error, {
          metric: reading.metricName,
          label: reading.deviceLabel,
          topic,
        });
        failed.push({
          deviceLabel: reading.deviceLabel,
          metricName: reading.metricName,
          error: errorMessage(error),
        });
      }
    }
    return published;
  }

  private logSummary(
    readings: readonly Reading[],
    published: readonly string[],
    failed: readonly FailedMetric[]
  ): void {
    for (const label of this.options.registerMap.labels()) {
      const values = readings.filter((r) => r.deviceLabel === label);
      const value = (name: string) =>
        values.find((r) => r.metricName === name)?.value;
      const prefix = buildTopic(this.options.topicPrefix, label, '');
      const count = published.filter((topic) => topic.startsWith(prefix)).length;

      logInfo(COMPONENT, `Published ${count} metrics for ${label}`, {
        cycle: this.cycle,
        power: value('Power'),
        import: value('Import'),
        failed: failed.filter((f) => f.deviceLabel === label).map((f) => f.metricName),
      });
    }
  }

  private async release(): Promise<void> {
    for (const client of [this.options.fieldBus, this.options.publisher]) {
      try {
        await client.close();
      } catch (error) {
        logError(COMPONENT, 'Error releasing connection', error);
      }
    }
    logInfo(COMPONENT, 'Stopped');
  }
}
