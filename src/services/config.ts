import { z } from 'zod';
import type { AppConfig, QoS } from '../types/config.js';
import { ConfigurationError } from '../utils/errors.js';

// z.coerce.boolean() treats the string "false" as true
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined || val.trim() === ''
        ? defaultValue
        : ['1', 'true', 'yes'].includes(val.trim().toLowerCase())
    );

const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== '' ? val : undefined));

const port = (defaultValue: number) =>
  z.coerce.number().int().min(1).max(65535).default(defaultValue);

const EnvSchema = z.object({
  MODBUS_HOST: z.string().min(1).default('192.168.1.50'),
  MODBUS_PORT: port(502),
  DEVICE_ID: z.coerce.number().int().min(0).max(255).default(1),
  MODBUS_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  MODBUS_MAX_CONNECT_ATTEMPTS: z.coerce.number().int().min(0).default(0),

  MQTT_BROKER: z.string().min(1).default('192.168.1.5'),
  MQTT_PORT: port(1883),
  MQTT_TOPIC_PREFIX: z.string().min(1).default('klskmp/metering/blitz'),
  MQTT_CLIENT_ID: z.string().min(1).default('blitz_publisher'),
  MQTT_USERNAME: optionalString,
  MQTT_PASSWORD: optionalString,
  MQTT_QOS: z
    .enum(['0', '1', '2'])
    .default('0')
    .transform((val): QoS => (val === '2' ? 2 : val === '1' ? 1 : 0)),
  MQTT_RETAIN: envBoolean(true),

  POLL_INTERVAL: z.coerce.number().positive().default(5),
  REGISTER_MAP_PATH: z.string().min(1).default('config/register-map.yaml'),
});

/**
 * Builds the application configuration from environment variables.
 * Throws ConfigurationError listing every invalid variable.
 */
export function readConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    modbus: {
      host: vars.MODBUS_HOST,
      port: vars.MODBUS_PORT,
      unitId: vars.DEVICE_ID,
      timeoutMs: vars.MODBUS_TIMEOUT_MS,
      maxConnectAttempts: vars.MODBUS_MAX_CONNECT_ATTEMPTS,
    },
    mqtt: {
      host: vars.MQTT_BROKER,
      port: vars.MQTT_PORT,
      topicPrefix: vars.MQTT_TOPIC_PREFIX,
      clientId: vars.MQTT_CLIENT_ID,
      username: vars.MQTT_USERNAME,
      password: vars.MQTT_PASSWORD,
      qos: vars.MQTT_QOS,
      retain: vars.MQTT_RETAIN,
    },
    pollIntervalMs: vars.POLL_INTERVAL * 1000,
    registerMapPath: vars.REGISTER_MAP_PATH,
  };
}
