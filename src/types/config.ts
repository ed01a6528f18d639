export type QoS = 0 | 1 | 2;

export interface DeviceConfig {
  host: string;
  port: number;
  unitId: number;
  timeoutMs: number;
  /** 0 retries the connection forever. */
  maxConnectAttempts: number;
}

export interface BrokerConfig {
  host: string;
  port: number;
  topicPrefix: string;
  clientId: string;
  username?: string;
  password?: string;
  qos: QoS;
  retain: boolean;
}

export interface AppConfig {
  modbus: DeviceConfig;
  mqtt: BrokerConfig;
  pollIntervalMs: number;
  registerMapPath: string;
}
