import * as net from 'node:net';
import * as Modbus from 'jsmodbus';
import type { FieldBusClient } from '../types/clients.js';
import type { DeviceConfig } from '../types/config.js';
import { ConnectionError, ReadError, errorMessage } from '../utils/errors.js';
import { logInfo, logError, logWarn } from '../utils/logger/index.js';

const COMPONENT = 'ModbusService';

/**
 * Modbus TCP connection to the charging station. Every `connect` opens a
 * fresh socket; a dropped connection is only noticed and reported through
 * `isConnected`, reconnecting is up to the caller.
 */
export class ModbusService implements FieldBusClient {
  private socket?: net.Socket;
  private client?: Modbus.ModbusTCPClient;
  private connected = false;

  constructor(private readonly config: DeviceConfig) {}

  public get isConnected(): boolean {
    return this.connected;
  }

  private get endpoint(): string {
    return `${this.config.host}:${this.config.port}`;
  }

  private setupSocketHandlers(socket: net.Socket): void {
    socket.on('error', (err) => {
      logError(COMPONENT, 'Modbus socket error', err);
    });

    socket.on('close', () => {
      if (this.socket !== socket) return;
      this.connected = false;
      this.socket = undefined;
      this.client = undefined;
      logWarn(COMPONENT, 'Modbus connection closed', { endpoint: this.endpoint });
    });
  }

  public async connect(): Promise<void> {
    await this.close();

    const socket = new net.Socket();
    const client = new Modbus.client.TCP(
      socket,
      this.config.unitId,
      this.config.timeoutMs
    );

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        clearTimeout(timeout);
        socket.destroy();
        reject(
          new ConnectionError(`Cannot connect to Modbus device ${this.endpoint}`, {
            cause: err,
          })
        );
      };

      const timeout = setTimeout(() => {
        socket.removeListener('error', onError);
        socket.destroy();
        reject(new ConnectionError(`Connection to ${this.endpoint} timed out`));
      }, this.config.timeoutMs);

      socket.once('error', onError);
      socket.connect(
        {
          host: this.config.host,
          port: this.config.port,
        },
        () => {
          clearTimeout(timeout);
          socket.removeListener('error', onError);
          resolve();
        }
      );
    });

    this.socket = socket;
    this.client = client;
    this.connected = true;
    this.setupSocketHandlers(socket);
    logInfo(COMPONENT, 'Connected to Modbus device', {
      endpoint: this.endpoint,
      unitId: this.config.unitId,
    });
  }

  public async readRegisters(address: number, count: number): Promise<Buffer> {
    if (!this.client || !this.connected) {
      throw new ReadError('Modbus device not connected');
    }

    try {
      const { response } = await this.client.readHoldingRegisters(address, count);
      return response.body.valuesAsBuffer;
    } catch (error) {
      throw new ReadError(
        `Failed to read ${count} register(s) at ${address}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  public async close(): Promise<void> {
    const socket = this.socket;
    this.socket = undefined;
    this.client = undefined;
    this.connected = false;

    if (!socket || socket.destroyed) return;

    await new Promise<void>((resolve) => {
      socket.once('close', () => resolve());
      socket.destroy();
    });
    logInfo(COMPONENT, 'Modbus connection released', { endpoint: this.endpoint });
  }
}
