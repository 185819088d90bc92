export type DeviceTarget = {
  host: string;
  username: string;
  password: string;
};

/**
 * One management session on one device. Steps reject with
 * `DeviceSessionError`; `close` may be called in any state and more than once.
 */
export interface DeviceSession {
  /** Transport setup and authentication. */
  connect(): Promise<void>;
  loadConfiguration(config: string): Promise<void>;
  commit(): Promise<void>;
  close(): Promise<void>;
}

export interface DeviceSessionFactory {
  create(target: DeviceTarget): DeviceSession;
}
