/**
 * Korad KA3305P Power Supply Driver
 *
 * Note: The remote interface is a half-duplex ASCII protocol with no line
 * terminator or length prefix. A reply is whatever the PSU has sent by the
 * time the settle delay expires, so every command is write, wait, drain.
 * STATUS? replies with one raw byte rather than text.
 * Line settings are fixed at 9600 baud 8N1.
 */

import type {
  ByteTransport,
  Channel,
  ClientOptions,
  DeviceCapabilities,
  DeviceInfo,
  InstrumentClient,
  InstrumentError,
  PanelSlot,
  StatusSnapshot,
  TrackingMode,
} from '../types.js';
import { Result, Ok, Err } from '../../../shared/types.js';
import { ResponseParser } from '../response-parser.js';
import { classifyOpenError, InstrumentErrors } from '../errors.js';
import { createSerialTransport } from '../transports/serial.js';

const LOG_PREFIX = '[KA3305P]';

export const DEFAULT_SETTLE_MS = 50;
const IDENTIFY_SETTLE_MS = 300;
const SETPOINT_SETTLE_MS = 100;

const CHANNELS: readonly Channel[] = [1, 2];
const PANELS: readonly PanelSlot[] = [1, 2, 3, 4, 5];
const TRACKING_MODES: readonly TrackingMode[] = [0, 1, 2];

const info: DeviceInfo = {
  id: 'korad-ka3305p',
  type: 'power-supply',
  manufacturer: 'Korad',
  model: 'KA3305P',
};

const capabilities: DeviceCapabilities = {
  channels: CHANNELS,
  panels: PANELS,
  trackingModes: TRACKING_MODES,
  modes: ['CV', 'CC'],
  setpoints: {
    voltage: { name: 'voltage', unit: 'V', decimals: 2 },
    current: { name: 'current', unit: 'A', decimals: 3 },
    ovp: { name: 'ovp', unit: 'V', decimals: 3 },
    ocp: { name: 'ocp', unit: 'A', decimals: 3 },
  },
};

const isChannel = (value: number): value is Channel =>
  CHANNELS.some(c => c === value);
const isPanel = (value: number): value is PanelSlot =>
  PANELS.some(p => p === value);
const isTrackingMode = (value: number): value is TrackingMode =>
  TRACKING_MODES.some(m => m === value);

function checkChannel(channel: number): Result<Channel, InstrumentError> {
  return isChannel(channel)
    ? Ok(channel)
    : Err(InstrumentErrors.invalidArgument('channel', channel, CHANNELS));
}

function checkSetpoint(argument: string, value: number): Result<number, InstrumentError> {
  return Number.isFinite(value) && value >= 0
    ? Ok(value)
    : Err(InstrumentErrors.invalidArgument(argument, value, 'finite, non-negative numbers'));
}

/**
 * Fixed-point text for a setpoint. Exact binary ties (0.125 at two
 * decimals) round to the even digit; toFixed() would round them up.
 */
function formatSetpoint(value: number, decimals: number): string {
  const isTie = !Number.isInteger(value * 2 ** decimals) && Number.isInteger(value * 2 ** (decimals + 1));
  if (!isTie) return value.toFixed(decimals);

  let scaled = Math.ceil(value * 10 ** decimals);
  if (scaled % 2 === 1) scaled -= 1;
  if (decimals === 0) return String(scaled);
  const digits = String(scaled).padStart(decimals + 1, '0');
  return `${digits.slice(0, -decimals)}.${digits.slice(-decimals)}`;
}

const defaultSleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

// Expects an open transport; openKoradKA3305P() supplies the first real status
function createClient(
  transport: ByteTransport,
  initialStatus: StatusSnapshot,
  options: ClientOptions
): InstrumentClient {
  const { trace = false, settleScale = 1, sleep = defaultSleep } = options;

  let connected = true;
  let status = initialStatus;

  // One command in flight at a time; replies carry no framing to tell them apart
  let commandLock: Promise<void> = Promise.resolve();

  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previousLock = commandLock;
    let releaseLock: () => void = () => {};
    commandLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    return previousLock.then(fn).finally(() => releaseLock());
  }

  async function exchange(
    command: string,
    settleMs: number = DEFAULT_SETTLE_MS
  ): Promise<Result<string | null, InstrumentError>> {
    return withLock(async () => {
      if (!connected || !transport.isOpen()) {
        return Err(InstrumentErrors.notConnected());
      }

      const bytes = Buffer.from(command, 'latin1');
      if (trace) console.debug(`${LOG_PREFIX} > ${command}`);

      const writeResult = await transport.write(bytes);
      if (!writeResult.ok) return Err(InstrumentErrors.transport(writeResult.error));
      if (writeResult.value !== bytes.length) {
        return Err(InstrumentErrors.transport(
          new Error(`Short write: ${writeResult.value} of ${bytes.length} bytes for ${command}`)
        ));
      }

      await sleep(settleMs * settleScale);

      let reply = '';
      while (transport.bytesAvailable() > 0) {
        const byte = transport.readOne();
        if (!byte.ok) return Err(InstrumentErrors.transport(byte.error));
        reply += String.fromCharCode(byte.value);
      }

      if (trace) console.debug(`${LOG_PREFIX} < ${reply === '' ? '(no response)' : JSON.stringify(reply)}`);
      return Ok(reply === '' ? null : reply);
    });
  }

  // Fire-and-forget commands still drain whatever the PSU echoes back
  async function send(command: string, settleMs?: number): Promise<Result<void, InstrumentError>> {
    return Result.map(await exchange(command, settleMs), () => undefined);
  }

  async function queryRequired(command: string): Promise<Result<string, InstrumentError>> {
    const result = await exchange(command);
    if (!result.ok) return result;
    if (result.value === null) return Err(InstrumentErrors.noResponse(command));
    return Ok(result.value);
  }

  async function queryNumber(command: string): Promise<Result<number, InstrumentError>> {
    const reply = await queryRequired(command);
    if (!reply.ok) return reply;
    return Result.mapErr(
      ResponseParser.parseNumber(reply.value),
      detail => InstrumentErrors.noResponse(command, detail)
    );
  }

  async function setChannelValue(
    prefix: string,
    argument: string,
    channel: number,
    value: number,
    decimals: number
  ): Promise<Result<void, InstrumentError>> {
    const ch = checkChannel(channel);
    if (!ch.ok) return ch;
    const checked = checkSetpoint(argument, value);
    if (!checked.ok) return checked;
    return send(`${prefix}${ch.value}:${formatSetpoint(checked.value, decimals)}`, SETPOINT_SETTLE_MS);
  }

  async function queryChannel(prefix: string, channel: number): Promise<Result<string | null, InstrumentError>> {
    const ch = checkChannel(channel);
    if (!ch.ok) return ch;
    return exchange(`${prefix}${ch.value}?`);
  }

  const { setpoints } = capabilities;

  return {
    info,
    capabilities,

    get connected(): boolean {
      return connected && transport.isOpen();
    },

    get status(): StatusSnapshot {
      return status;
    },

    exchange,

    async identify() {
      return exchange('*IDN?', IDENTIFY_SETTLE_MS);
    },

    async getIdentity() {
      const reply = await exchange('*IDN?', IDENTIFY_SETTLE_MS);
      if (!reply.ok) return reply;
      if (reply.value === null) return Err(InstrumentErrors.noResponse('*IDN?'));
      return Result.mapErr(
        ResponseParser.parseIdentity(reply.value),
        detail => InstrumentErrors.noResponse('*IDN?', detail)
      );
    },

    async setVoltage(channel, volts) {
      return setChannelValue('VSET', 'voltage', channel, volts, setpoints.voltage.decimals);
    },

    async getSetVoltage(channel) {
      return queryChannel('VSET', channel);
    },

    async readVoltage(channel) {
      return queryChannel('VOUT', channel);
    },

    async setCurrent(channel, amps) {
      return setChannelValue('ISET', 'current', channel, amps, setpoints.current.decimals);
    },

    async getSetCurrent(channel) {
      return queryChannel('ISET', channel);
    },

    async readCurrent(channel) {
      return queryChannel('IOUT', channel);
    },

    async measure(channel) {
      const ch = checkChannel(channel);
      if (!ch.ok) return ch;

      const voltage = await queryNumber(`VOUT${ch.value}?`);
      if (!voltage.ok) return voltage;

      const current = await queryNumber(`IOUT${ch.value}?`);
      if (!current.ok) return current;

      return Ok({
        voltage: voltage.value,
        current: current.value,
        power: voltage.value * current.value,
      });
    },

    async setOutput(on) {
      return send(on ? 'OUT1' : 'OUT0');
    },

    async setOcpEnabled(on) {
      return send(on ? 'OCP1' : 'OCP0');
    },

    async setOcpLimit(channel, amps) {
      return setChannelValue('OCPSTE', 'ocp', channel, amps, setpoints.ocp.decimals);
    },

    async setOvpEnabled(on) {
      return send(on ? 'OVP1' : 'OVP0');
    },

    async setOvpLimit(channel, volts) {
      return setChannelValue('OVPSTE', 'ovp', channel, volts, setpoints.ovp.decimals);
    },

    async recallPanel(panel) {
      if (!isPanel(panel)) return Err(InstrumentErrors.invalidArgument('panel', panel, PANELS));
      return send(`RCL${panel}`);
    },

    async savePanel(panel) {
      if (!isPanel(panel)) return Err(InstrumentErrors.invalidArgument('panel', panel, PANELS));
      return send(`SAV${panel}`);
    },

    async setTrackingMode(mode) {
      if (!isTrackingMode(mode)) {
        return Err(InstrumentErrors.invalidArgument('tracking mode', mode, TRACKING_MODES));
      }
      return send(`TRACK${mode}`);
    },

    async getStatus() {
      const reply = await queryRequired('STATUS?');
      if (!reply.ok) return reply;
      status = ResponseParser.decodeStatus(reply.value.charCodeAt(0));
      return Ok(status);
    },

    async close() {
      if (!connected) return Ok();
      connected = false;
      // Wait for an in-flight command before pulling the port away
      const closed = await withLock(() => transport.close());
      return closed.ok ? Ok() : Err(InstrumentErrors.transport(closed.error));
    },
  };
}

/**
 * Open a transport and read the initial status.
 *
 * Resolves to ConnectFailed when the port cannot be opened or the PSU does
 * not answer STATUS?; in the latter case the transport is closed again.
 */
export async function openKoradKA3305P(
  transport: ByteTransport,
  options: ClientOptions = {}
): Promise<Result<InstrumentClient, InstrumentError>> {
  const openResult = await transport.open();
  if (!openResult.ok) {
    const reason = classifyOpenError(openResult.error);
    console.warn(`${LOG_PREFIX} Port open failed (${reason}):`, openResult.error.message);
    return Err(InstrumentErrors.connectFailed(reason, openResult.error.message, openResult.error));
  }

  // The placeholder snapshot is replaced by the status query below
  const client = createClient(transport, ResponseParser.decodeStatus(0), options);
  const statusResult = await client.getStatus();
  if (!statusResult.ok) {
    const closeResult = await transport.close();
    if (!closeResult.ok) {
      console.warn(`${LOG_PREFIX} Failed to close port after failed status query:`, closeResult.error.message);
    }
    const cause = statusResult.error.kind === 'TransportError' ? statusResult.error.cause : undefined;
    console.warn(`${LOG_PREFIX} Instrument did not answer status query: ${statusResult.error.message}`);
    return Err(InstrumentErrors.connectFailed('no_response', statusResult.error.message, cause));
  }

  return Ok(client);
}

/**
 * Connect to a KA3305P on a serial device path (e.g. /dev/ttyACM0, COM3)
 * at the fixed 9600 8N1 line settings.
 */
export async function connectKoradKA3305P(
  path: string,
  options: ClientOptions = {}
): Promise<Result<InstrumentClient, InstrumentError>> {
  return openKoradKA3305P(createSerialTransport({ path }), options);
}
