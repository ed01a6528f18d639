import { beforeEach, describe, it, expect, vi } from 'vitest';
import { readConfig } from '../src/services/config.js';
import { MqttService } from '../src/services/mqtt.js';
import { ConnectionError, PublishError } from '../src/utils/errors.js';

const { connectAsync } = vi.hoisted(() => ({ connectAsync: vi.fn() }));

vi.mock('mqtt', () => ({
  default: { connectAsync },
}));

class FakeClient {
  public connected = true;
  public publishAsync = vi.fn(async (_topic: string, _payload: string, _opts: object) => undefined);
  public endAsync = vi.fn(async () => undefined);
  public handlers: string[] = [];

  on(event: string, _cb: (...args: unknown[]) => void): this {
    this.handlers.push(event);
    return this;
  }
}

describe('MqttService', () => {
  const config = readConfig({}).mqtt;
  let fake: FakeClient;

  beforeEach(() => {
    fake = new FakeClient();
    connectAsync.mockReset();
    connectAsync.mockResolvedValue(fake);
  });

  it('builds the broker URL from host and port', () => {
    expect(new MqttService(config).brokerUrl).toBe('mqtt://192.168.1.5:1883');
  });

  it('connects once without the client retrying on its own', async () => {
    const service = new MqttService(config);
    await service.connect();

    expect(connectAsync).toHaveBeenCalledTimes(1);
    expect(connectAsync).toHaveBeenCalledWith(
      'mqtt://192.168.1.5:1883',
      { clientId: 'blitz_publisher', username: undefined, password: undefined },
      false
    );
    expect(fake.handlers).toEqual(['close', 'reconnect', 'error', 'offline']);
  });

  it('reports a failed connect as a ConnectionError', async () => {
    connectAsync.mockRejectedValue(new Error('connect ECONNREFUSED'));
    const service = new MqttService(config);

    await expect(service.connect()).rejects.toThrow(ConnectionError);
    await expect(service.connect()).rejects.toThrow(
      'Cannot connect to MQTT broker mqtt://192.168.1.5:1883'
    );
  });

  it('publishes retained with the default qos', async () => {
    const service = new MqttService(config);
    await service.connect();
    await service.publish('klskmp/metering/blitz/links/Power', '3500.0');

    expect(fake.publishAsync).toHaveBeenCalledWith(
      'klskmp/metering/blitz/links/Power',
      '3500.0',
      { qos: 0, retain: true }
    );
  });

  it('passes the configured qos and retain flag', async () => {
    const service = new MqttService(
      readConfig({ MQTT_QOS: '1', MQTT_RETAIN: 'false' }).mqtt
    );
    await service.connect();
    await service.publish('t', '1.0');

    expect(fake.publishAsync).toHaveBeenCalledWith('t', '1.0', { qos: 1, retain: false });
  });

  it('wraps a rejected publish in a PublishError', async () => {
    fake.publishAsync.mockRejectedValueOnce(new Error('client disconnecting'));
    const service = new MqttService(config);
    await service.connect();

    await expect(service.publish('t', '1.0')).rejects.toThrow(
      'Error publishing to t: client disconnecting'
    );
  });

  it('refuses to publish while the client is offline', async () => {
    const service = new MqttService(config);
    await expect(service.publish('t', '1.0')).rejects.toThrow(PublishError);

    await service.connect();
    fake.connected = false;
    await expect(service.publish('t', '1.0')).rejects.toThrow(PublishError);
    expect(fake.publishAsync).not.toHaveBeenCalled();
  });

  it('ends the client on close', async () => {
    const service = new MqttService(config);
    await service.connect();
    await service.close();
    await service.close();

    expect(fake.endAsync).toHaveBeenCalledTimes(1);
  });

  it('closes without a connection', async () => {
    await expect(new MqttService(config).close()).resolves.toBeUndefined();
  });
});
