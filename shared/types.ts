// Shared types for the driver, simulator and demo harness

// ============ Result Type ============
// Use Result<T, E> instead of throwing exceptions.
// Try/catch only at boundaries (transport layer wrapping external libs).

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// Helper constructors
export function Ok(): Result<void, never>;
export function Ok<T>(value: T): Result<T, never>;
export function Ok<T>(value?: T): Result<T | undefined, never> {
  return { ok: true, value };
}
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// Normalize anything thrown by a library callback into an Error
export const toError = (e: unknown): Error =>
  e instanceof Error ? e : new Error(String(e));

// Result utilities for ergonomic chaining
export const Result = {
  /** Transform the success value */
  map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
    return result.ok ? Ok(fn(result.value)) : result;
  },

  /** Map error type */
  mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
    return result.ok ? result : Err(fn(result.error));
  },
};

// ============ Instrument Types ============

export type Channel = 1 | 2;

/** Non-volatile front-panel memory slot inside the instrument */
export type PanelSlot = 1 | 2 | 3 | 4 | 5;

/** How the two channels are combined: independent, series or parallel */
export type TrackingMode = 0 | 1 | 2;

export const TrackingModes = {
  Independent: 0,
  Series: 1,
  Parallel: 2,
} as const satisfies Record<string, TrackingMode>;

export type RegulationMode = 'CC' | 'CV';
export type OutputState = 'On' | 'Off';

/**
 * Decoded STATUS? reply. A fresh frozen value is produced by every status
 * query; holders of an older snapshot never see it change.
 */
export interface StatusSnapshot {
  readonly mode: RegulationMode;
  readonly output: OutputState;
}

export interface InstrumentIdentity {
  manufacturer: string;
  model: string;
  version?: string;
  serial?: string;
}

export interface Measurement {
  voltage: number;
  current: number;
  power: number;
}

export interface DeviceInfo {
  id: string;
  type: 'power-supply';
  manufacturer: string;
  model: string;
}

export interface ValueDescriptor {
  name: string;
  unit: string;
  /** Fixed-point digits the instrument's parser expects */
  decimals: number;
}

export interface DeviceCapabilities {
  channels: readonly Channel[];
  panels: readonly PanelSlot[];
  trackingModes: readonly TrackingMode[];
  modes: readonly RegulationMode[];
  setpoints: {
    voltage: ValueDescriptor;
    current: ValueDescriptor;
    ovp: ValueDescriptor;
    ocp: ValueDescriptor;
  };
}

// ============ Error Types ============

/**
 * Why a connection attempt failed. The serial layer only reports free-form
 * messages, so the partition is derived from the OS error text.
 */
export type ConnectFailureReason =
  | 'port_not_found'
  | 'access_denied'
  | 'port_busy'
  | 'no_response'
  | 'unknown';

export type InstrumentError =
  | { kind: 'ConnectFailed'; reason: ConnectFailureReason; message: string; cause?: Error }
  | { kind: 'NotConnected'; message: string }
  | {
      kind: 'InvalidArgument';
      argument: string;
      value: number;
      validValues: readonly number[] | string;
      message: string;
    }
  | { kind: 'NoResponse'; command: string; message: string }
  | { kind: 'TransportError'; message: string; cause: Error };
