import mqtt, { type MqttClient } from 'mqtt';
import type { Publisher } from '../types/clients.js';
import type { BrokerConfig } from '../types/config.js';
import { ConnectionError, PublishError, errorMessage } from '../utils/errors.js';
import { logInfo, logError, logWarn } from '../utils/logger/index.js';

const COMPONENT = 'MqttService';

/**
 * Broker connection used for publishing readings. The first connect is made
 * without the client's own retries so failures reach the caller; once up,
 * mqtt.js reconnects by itself.
 */
export class MqttService implements Publisher {
  private client?: MqttClient;

  constructor(private readonly config: BrokerConfig) {}

  public get brokerUrl(): string {
    return `mqtt://${this.config.host}:${this.config.port}`;
  }

  public async connect(): Promise<void> {
    try {
      this.client = await mqtt.connectAsync(
        this.brokerUrl,
        {
          clientId: this.config.clientId,
          username: this.config.username,
          password: this.config.password,
        },
        false
      );
    } catch (error) {
      throw new ConnectionError(`Cannot connect to MQTT broker ${this.brokerUrl}`, {
        cause: error,
      });
    }

    logInfo(COMPONENT, 'Connected to MQTT broker', { broker: this.brokerUrl });
    this.setupEventHandlers(this.client);
  }

  private setupEventHandlers(client: MqttClient): void {
    client.on('close', () => {
      logWarn(COMPONENT, 'MQTT connection closed');
    });

    client.on('reconnect', () => {
      logInfo(COMPONENT, 'MQTT reconnecting...');
    });

    client.on('error', (error) => {
      logError(COMPONENT, 'MQTT connection error', error);
    });

    client.on('offline', () => {
      logWarn(COMPONENT, 'MQTT connection offline');
    });
  }

  public async publish(topic: string, payload: string): Promise<void> {
    if (!this.client?.connected) {
      throw new PublishError(`Cannot publish to ${topic}: not connected to MQTT broker`);
    }

    try {
      await this.client.publishAsync(topic, payload, {
        qos: this.config.qos,
        retain: this.config.retain,
      });
    } catch (error) {
      throw new PublishError(`Error publishing to ${topic}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  public async close(): Promise<void> {
    const client = this.client;
    this.client = undefined;
    if (!client) return;

    await client.endAsync();
    logInfo(COMPONENT, 'MQTT connection released');
  }
}
