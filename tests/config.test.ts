import { describe, it, expect } from 'vitest';
import { readConfig } from '../src/services/config.js';
import { ConfigurationError } from '../src/utils/errors.js';

describe('readConfig', () => {
  it('falls back to the defaults for an empty environment', () => {
    expect(readConfig({})).toEqual({
      modbus: {
        host: '192.168.1.50',
        port: 502,
        unitId: 1,
        timeoutMs: 5000,
        maxConnectAttempts: 0,
      },
      mqtt: {
        host: '192.168.1.5',
        port: 1883,
        topicPrefix: 'klskmp/metering/blitz',
        clientId: 'blitz_publisher',
        username: undefined,
        password: undefined,
        qos: 0,
        retain: true,
      },
      pollIntervalMs: 5000,
      registerMapPath: 'config/register-map.yaml',
    });
  });

  it('uses the default Modbus host when MODBUS_HOST is unset', () => {
    expect(readConfig({ MODBUS_PORT: '1502' }).modbus.host).toBe('192.168.1.50');
  });

  it('reads overrides from the environment', () => {
    const config = readConfig({
      MODBUS_HOST: '10.0.0.2',
      DEVICE_ID: '3',
      MQTT_TOPIC_PREFIX: 'site/meters',
      MQTT_QOS: '1',
      MQTT_RETAIN: 'false',
      MQTT_USERNAME: 'bridge',
      MQTT_PASSWORD: 'test-secret',
      POLL_INTERVAL: '30',
      MODBUS_MAX_CONNECT_ATTEMPTS: '5',
    });

    expect(config.modbus.host).toBe('10.0.0.2');
    expect(config.modbus.unitId).toBe(3);
    expect(config.modbus.maxConnectAttempts).toBe(5);
    expect(config.mqtt.topicPrefix).toBe('site/meters');
    expect(config.mqtt.qos).toBe(1);
    expect(config.mqtt.retain).toBe(false);
    expect(config.mqtt.username).toBe('bridge');
    expect(config.mqtt.password).toBe('test-secret');
    expect(config.pollIntervalMs).toBe(30000);
  });

  it('treats empty credentials as unset', () => {
    expect(readConfig({ MQTT_USERNAME: '' }).mqtt.username).toBeUndefined();
  });

  it('rejects invalid values with a ConfigurationError', () => {
    expect(() => readConfig({ MODBUS_PORT: 'abc' })).toThrow(ConfigurationError);
    expect(() => readConfig({ MODBUS_PORT: 'abc' })).toThrow(/MODBUS_PORT/);
    expect(() => readConfig({ MQTT_QOS: '3' })).toThrow(/MQTT_QOS/);
    expect(() => readConfig({ POLL_INTERVAL: '0' })).toThrow(/POLL_INTERVAL/);
  });
});
