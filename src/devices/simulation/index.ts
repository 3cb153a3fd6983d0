/**
 * Simulation Module
 * Creates a simulated KA3305P behind the same ByteTransport the serial
 * port provides, so the real driver runs unchanged against it.
 *
 * Usage:
 *   const { transport, simulator } = createSimulatedKA3305P();
 *   const client = await openKoradKA3305P(transport);
 */

import type { ByteTransport } from '../types.js';
import {
  createKA3305PSimulator,
  type KA3305PSimulator,
  type KA3305PSimulatorConfig,
} from './ka3305p-simulator.js';
import { createSimulatedTransport } from './simulated-transport.js';

export interface SimulatedKA3305P {
  transport: ByteTransport;
  simulator: KA3305PSimulator;
}

export function createSimulatedKA3305P(config: KA3305PSimulatorConfig = {}): SimulatedKA3305P {
  const simulator = createKA3305PSimulator(config);
  const transport = createSimulatedTransport(cmd => simulator.handleCommand(cmd));
  return { transport, simulator };
}

export { createKA3305PSimulator, createSimulatedTransport };
export type { KA3305PSimulator, KA3305PSimulatorConfig };
