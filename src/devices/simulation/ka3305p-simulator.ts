/**
 * KA3305P Simulator
 * Simulates the Korad two-channel PSU command set
 *
 * Command set:
 * - *IDN?                        - Identity string
 * - VSET<n>? / VSET<n>:<volts>   - Voltage setpoint
 * - ISET<n>? / ISET<n>:<amps>    - Current limit
 * - VOUT<n>? / IOUT<n>?          - Measured output
 * - OUT0|1, OCP0|1, OVP0|1       - Output and protection enables
 * - OCPSTE<n>:<amps>             - OCP trip level
 * - OVPSTE<n>:<volts>            - OVP trip level
 * - RCL<n> / SAV<n>              - Panel memory (1-5)
 * - TRACK0|1|2                   - Independent / series / parallel
 * - STATUS?                      - Raw status byte
 *
 * Each channel drives a resistive load (open circuit by default). The
 * channel is in CC when V/R would exceed the current limit; a 0 ohm load
 * is a short and always regulates in CC at 0 V.
 */

import type { Channel, PanelSlot, TrackingMode } from '../../../shared/types.js';

export interface KA3305PSimulatorConfig {
  /** Reply to *IDN? */
  identity?: string;
  /** Load resistance per channel in ohms (default: Infinity, open circuit) */
  loadOhms?: Partial<Record<Channel, number>>;
}

export interface ChannelState {
  voltageSetpoint: number;
  currentLimit: number;
  ovpLimit: number;
  ocpLimit: number;
}

export interface SimulatorState {
  channels: Record<Channel, ChannelState>;
  outputEnabled: boolean;
  ocpEnabled: boolean;
  ovpEnabled: boolean;
  trackingMode: TrackingMode;
  panels: Partial<Record<PanelSlot, Record<Channel, ChannelState>>>;
}

export interface KA3305PSimulator {
  /** Returns the reply text, or null when the PSU stays silent */
  handleCommand(cmd: string): string | null;
  setLoad(channel: Channel, ohms: number): void;
  getState(): SimulatorState;
  /** Regulation mode of a channel under its current load */
  getMode(channel: Channel): 'CC' | 'CV';
  statusByte(): number;
}

const MAX_VOLTAGE = 31;
const MAX_CURRENT = 5.1;

const PANEL_SLOTS: readonly PanelSlot[] = [1, 2, 3, 4, 5];

const CHANNEL_COMMAND = /^(VSET|ISET|VOUT|IOUT|OCPSTE|OVPSTE)([12])(\?|:(.+))$/;
const TOGGLE_COMMAND = /^(OUT|OCP|OVP)([01])$/;
const PANEL_COMMAND = /^(RCL|SAV)([1-5])$/;
const TRACK_COMMAND = /^TRACK([012])$/;

const toChannel = (digit: string): Channel => (digit === '1' ? 1 : 2);
const toPanel = (digit: string): PanelSlot => {
  switch (digit) {
    case '1': return 1;
    case '2': return 2;
    case '3': return 3;
    case '4': return 4;
    default: return 5;
  }
};
const toTrackingMode = (digit: string): TrackingMode =>
  digit === '0' ? 0 : digit === '1' ? 1 : 2;

const initialChannel = (): ChannelState => ({
  voltageSetpoint: 0,
  currentLimit: 0,
  ovpLimit: MAX_VOLTAGE,
  ocpLimit: MAX_CURRENT,
});

const copyChannels = (channels: Record<Channel, ChannelState>): Record<Channel, ChannelState> => ({
  1: { ...channels[1] },
  2: { ...channels[2] },
});

export function createKA3305PSimulator(config: KA3305PSimulatorConfig = {}): KA3305PSimulator {
  const identity = config.identity ?? 'KORAD KA3305P V5.8 SN:00000001';
  const loadOhms: Record<Channel, number> = {
    1: config.loadOhms?.[1] ?? Infinity,
    2: config.loadOhms?.[2] ?? Infinity,
  };

  const state: SimulatorState = {
    channels: { 1: initialChannel(), 2: initialChannel() },
    outputEnabled: false,
    ocpEnabled: false,
    ovpEnabled: false,
    trackingMode: 0,
    panels: {},
  };

  /**
   * Ideal output of a channel. A resistive load draws V/R until the
   * current limit is reached, after which voltage falls to I*R.
   */
  function calculateOutput(channel: Channel): { voltage: number; current: number; mode: 'CC' | 'CV' } {
    const { voltageSetpoint, currentLimit } = state.channels[channel];
    if (!state.outputEnabled) {
      return { voltage: 0, current: 0, mode: 'CV' };
    }

    const ohms = loadOhms[channel];
    if (ohms === 0) {
      return { voltage: 0, current: currentLimit, mode: 'CC' };
    }
    const demanded = Number.isFinite(ohms) && ohms > 0 ? voltageSetpoint / ohms : 0;
    if (demanded > currentLimit) {
      return { voltage: currentLimit * ohms, current: currentLimit, mode: 'CC' };
    }
    return { voltage: voltageSetpoint, current: demanded, mode: 'CV' };
  }

  // Protection trips drop the output like the front panel does
  function checkProtection(): void {
    if (!state.outputEnabled) return;
    for (const channel of [1, 2] as const) {
      const { voltage, current } = calculateOutput(channel);
      const limits = state.channels[channel];
      if (state.ovpEnabled && voltage > limits.ovpLimit) state.outputEnabled = false;
      if (state.ocpEnabled && current > limits.ocpLimit) state.outputEnabled = false;
    }
  }

  function statusByte(): number {
    let byte = 0;
    if (calculateOutput(1).mode === 'CV') byte |= 1 << 0;
    if (calculateOutput(2).mode === 'CV') byte |= 1 << 1;
    byte |= state.trackingMode << 2;
    if (state.outputEnabled) byte |= 1 << 6;
    return byte;
  }

  function handleChannelCommand(match: RegExpMatchArray): string | null {
    const [, command, digit, , argument] = match;
    const channel = toChannel(digit);
    const settings = state.channels[channel];

    if (argument === undefined) {
      switch (command) {
        case 'VSET': return settings.voltageSetpoint.toFixed(2);
        case 'ISET': return settings.currentLimit.toFixed(3);
        case 'VOUT': return calculateOutput(channel).voltage.toFixed(2);
        case 'IOUT': return calculateOutput(channel).current.toFixed(3);
        default: return null;
      }
    }

    const value = Number(argument);
    if (!Number.isFinite(value) || value < 0) return null;

    switch (command) {
      case 'VSET':
        if (value <= MAX_VOLTAGE) settings.voltageSetpoint = value;
        break;
      case 'ISET':
        if (value <= MAX_CURRENT) settings.currentLimit = value;
        break;
      case 'OVPSTE':
        if (value <= MAX_VOLTAGE) settings.ovpLimit = value;
        break;
      case 'OCPSTE':
        if (value <= MAX_CURRENT) settings.ocpLimit = value;
        break;
    }
    checkProtection();
    return null;
  }

  function handleCommand(cmd: string): string | null {
    const trimmed = cmd.trim().toUpperCase();

    if (trimmed === '*IDN?') return identity;
    if (trimmed === 'STATUS?') return String.fromCharCode(statusByte());

    const channelMatch = trimmed.match(CHANNEL_COMMAND);
    if (channelMatch) return handleChannelCommand(channelMatch);

    const toggleMatch = trimmed.match(TOGGLE_COMMAND);
    if (toggleMatch) {
      const enabled = toggleMatch[2] === '1';
      switch (toggleMatch[1]) {
        case 'OUT': state.outputEnabled = enabled; break;
        case 'OCP': state.ocpEnabled = enabled; break;
        case 'OVP': state.ovpEnabled = enabled; break;
      }
      checkProtection();
      return null;
    }

    const panelMatch = trimmed.match(PANEL_COMMAND);
    if (panelMatch) {
      const slot = toPanel(panelMatch[2]);
      if (panelMatch[1] === 'SAV') {
        state.panels[slot] = copyChannels(state.channels);
      } else {
        const saved = state.panels[slot];
        if (saved) state.channels = copyChannels(saved);
        checkProtection();
      }
      return null;
    }

    const trackMatch = trimmed.match(TRACK_COMMAND);
    if (trackMatch) {
      state.trackingMode = toTrackingMode(trackMatch[1]);
      return null;
    }

    // Unknown command - the real PSU ignores it silently
    console.warn(`[KA3305P Simulator] Unknown command: ${cmd}`);
    return null;
  }

  return {
    handleCommand,

    setLoad(channel: Channel, ohms: number): void {
      loadOhms[channel] = ohms;
      checkProtection();
    },

    getState(): SimulatorState {
      const panels: SimulatorState['panels'] = {};
      for (const slot of PANEL_SLOTS) {
        const saved = state.panels[slot];
        if (saved) panels[slot] = copyChannels(saved);
      }
      return {
        ...state,
        channels: copyChannels(state.channels),
        panels,
      };
    },

    getMode(channel: Channel): 'CC' | 'CV' {
      return calculateOutput(channel).mode;
    },

    statusByte,
  };
}
