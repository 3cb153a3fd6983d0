// Re-export shared types
export * from '../../shared/types.js';

import type {
  Result,
  DeviceInfo,
  DeviceCapabilities,
  InstrumentError,
  InstrumentIdentity,
  Measurement,
  StatusSnapshot,
} from '../../shared/types.js';

/**
 * Byte-oriented serial channel. Replies have no framing, so the client
 * writes a command, waits, then drains whatever has been buffered.
 */
export interface ByteTransport {
  open(): Promise<Result<void, Error>>;
  close(): Promise<Result<void, Error>>;
  /** Resolves with the number of bytes handed to the device */
  write(data: Buffer): Promise<Result<number, Error>>;
  bytesAvailable(): number;
  readOne(): Result<number, Error>;
  isOpen(): boolean;
}

export interface SerialOptions {
  baudRate: number;
  dataBits: 8 | 7 | 6 | 5;
  parity: 'none' | 'even' | 'odd' | 'mark' | 'space';
  stopBits: 1 | 1.5 | 2;
}

export interface ClientOptions {
  /** Log every command and reply with console.debug */
  trace?: boolean;
  /** Multiplier applied to every settle delay (slow USB adapters) */
  settleScale?: number;
  /** Timer used for settle delays; replaced in tests */
  sleep?: (ms: number) => Promise<void>;
}

type Reply = Promise<Result<string | null, InstrumentError>>;
type Done = Promise<Result<void, InstrumentError>>;

/**
 * Request/response client for a two-channel Korad-protocol PSU.
 *
 * Channel, panel and mode arguments are plain numbers so that values from
 * untyped callers are still checked; out-of-range values fail with
 * InvalidArgument before anything is written.
 */
export interface InstrumentClient {
  readonly info: DeviceInfo;
  readonly capabilities: DeviceCapabilities;
  readonly connected: boolean;
  /** Most recent successful status query */
  readonly status: StatusSnapshot;

  exchange(command: string, settleMs?: number): Reply;

  identify(): Reply;
  getIdentity(): Promise<Result<InstrumentIdentity, InstrumentError>>;

  setVoltage(channel: number, volts: number): Done;
  getSetVoltage(channel: number): Reply;
  readVoltage(channel: number): Reply;
  setCurrent(channel: number, amps: number): Done;
  getSetCurrent(channel: number): Reply;
  readCurrent(channel: number): Reply;
  measure(channel: number): Promise<Result<Measurement, InstrumentError>>;

  setOutput(on: boolean): Done;
  setOcpEnabled(on: boolean): Done;
  setOcpLimit(channel: number, amps: number): Done;
  setOvpEnabled(on: boolean): Done;
  setOvpLimit(channel: number, volts: number): Done;

  recallPanel(panel: number): Done;
  savePanel(panel: number): Done;
  setTrackingMode(mode: number): Done;

  getStatus(): Promise<Result<StatusSnapshot, InstrumentError>>;

  close(): Done;
}
