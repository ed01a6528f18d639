import { readConfig } from './services/config.js';
import { ModbusService } from './services/modbus.js';
import { MqttService } from './services/mqtt.js';
import { PollLoop } from './services/pollLoop.js';
import { loadRegisterMap } from './services/registerMap.js';
import { ConfigurationError } from './utils/errors.js';
import { logInfo, logError } from './utils/logger/index.js';

const COMPONENT = 'Main';

async function main(): Promise<void> {
  const config = readConfig();
  const registerMap = await loadRegisterMap(config.registerMapPath);

  logInfo(COMPONENT, 'Configuration Summary:');
  logInfo(COMPONENT, `- Modbus: ${config.modbus.host}:${config.modbus.port} (unit ${config.modbus.unitId})`);
  logInfo(COMPONENT, `- MQTT: ${config.mqtt.host}:${config.mqtt.port}, prefix ${config.mqtt.topicPrefix}`);
  logInfo(COMPONENT, `- Register map: ${registerMap.size} metrics for ${registerMap.labels().join(', ')}`);
  logInfo(COMPONENT, `- Poll interval: ${config.pollIntervalMs / 1000}s`);

  const loop = new PollLoop({
    fieldBus: new ModbusService(config.modbus),
    publisher: new MqttService(config.mqtt),
    registerMap,
    topicPrefix: config.mqtt.topicPrefix,
    intervalMs: config.pollIntervalMs,
    retry: {
      initialDelay: 1000,
      maxDelay: 30000,
      maxAttempts: config.modbus.maxConnectAttempts,
    },
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logInfo(COMPONENT, `Received ${signal}, stopping services...`);
    loop.stop();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await loop.run();
}

main()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    logError(
      COMPONENT,
      error instanceof ConfigurationError ? 'Invalid configuration' : 'Service error',
      error
    );
    process.exit(1);
  });
