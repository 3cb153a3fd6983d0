/**
 * Simulated Transport
 * Implements ByteTransport for simulated devices
 *
 * Each write is decoded and routed to a command handler; the reply is
 * queued byte by byte so the client drains it exactly as it would drain a
 * real serial buffer.
 */

import type { ByteTransport } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';

export type CommandHandler = (cmd: string) => string | null;

export interface SimulatedTransportConfig {
  /** Error returned by open(), to simulate a missing or busy port */
  openError?: Error;
}

export function createSimulatedTransport(
  handler: CommandHandler,
  config: SimulatedTransportConfig = {}
): ByteTransport {
  let opened = false;
  const pending: number[] = [];

  return {
    async open(): Promise<Result<void, Error>> {
      if (config.openError) return Err(config.openError);
      opened = true;
      return Ok();
    },

    async close(): Promise<Result<void, Error>> {
      opened = false;
      pending.length = 0;
      return Ok();
    },

    async write(data: Buffer): Promise<Result<number, Error>> {
      if (!opened) return Err(new Error('Transport not opened'));
      const reply = handler(data.toString('latin1'));
      if (reply !== null) {
        for (const byte of Buffer.from(reply, 'latin1')) pending.push(byte);
      }
      return Ok(data.length);
    },

    bytesAvailable(): number {
      return pending.length;
    },

    readOne(): Result<number, Error> {
      const byte = pending.shift();
      return byte === undefined ? Err(new Error('No data available')) : Ok(byte);
    },

    isOpen(): boolean {
      return opened;
    },
  };
}
