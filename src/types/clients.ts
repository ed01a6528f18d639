export interface FieldBusClient {
  readonly isConnected: boolean;
  connect(): Promise<void>;
  /** Raw bytes of `count` holding registers starting at `address`. */
  readRegisters(address: number, count: number): Promise<Buffer>;
  close(): Promise<void>;
}

export interface Publisher {
  connect(): Promise<void>;
  publish(topic: string, payload: string): Promise<void>;
  close(): Promise<void>;
}
