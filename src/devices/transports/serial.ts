/**
 * Serial Transport
 * Byte-level serial port access for terminator-less instrument protocols
 *
 * Incoming data is queued as it arrives; the client decides when a reply
 * is complete and drains the queue one byte at a time.
 */

import { SerialPort } from 'serialport';
import type { ByteTransport, SerialOptions } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err, toError } from '../../../shared/types.js';

export interface SerialConfig extends Partial<SerialOptions> {
  path: string;
}

/** Line settings of the Korad remote interface */
export const KORAD_SERIAL_OPTIONS: SerialOptions = {
  baudRate: 9600,
  dataBits: 8,
  parity: 'none',
  stopBits: 1,
};

export function createSerialTransport(config: SerialConfig): ByteTransport {
  const { path, ...overrides } = config;
  const options: SerialOptions = { ...KORAD_SERIAL_OPTIONS, ...overrides };

  let port: SerialPort | null = null;
  let opened = false;
  let disconnected = false;
  let disconnectError: Error | null = null;
  const received: number[] = [];

  // The constructor throws synchronously on an invalid path or options
  function createPort(): Result<SerialPort, Error> {
    let serial: SerialPort;
    try {
      serial = new SerialPort({
        path,
        baudRate: options.baudRate,
        dataBits: options.dataBits,
        parity: options.parity,
        stopBits: options.stopBits,
        autoOpen: false,
      });
    } catch (e) {
      return Err(toError(e));
    }

    serial.on('data', (chunk: Buffer) => {
      for (const byte of chunk) received.push(byte);
    });

    // Listen for port disconnection events
    serial.on('close', () => {
      disconnected = true;
      disconnectError = new Error('SERIAL_PORT_DISCONNECTED: Port closed');
      opened = false;
    });

    serial.on('error', (err: Error) => {
      disconnected = true;
      disconnectError = new Error(`SERIAL_PORT_ERROR: ${err.message}`);
    });

    return Ok(serial);
  }

  return {
    async open(): Promise<Result<void, Error>> {
      if (opened) return Ok();

      const created = createPort();
      if (!created.ok) return created;
      const serial = created.value;

      try {
        await new Promise<void>((resolve, reject) => {
          serial.open((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      } catch (e) {
        serial.removeAllListeners();
        return Err(toError(e));
      }

      port = serial;
      opened = true;
      disconnected = false;
      disconnectError = null;
      return Ok();
    },

    async close(): Promise<Result<void, Error>> {
      const serial = port;
      if (!serial) return Ok();

      serial.removeAllListeners();

      let result: Result<void, Error> = Ok();
      // An 'error' event leaves the OS handle open until closed explicitly
      if (serial.isOpen) {
        result = await new Promise<Result<void, Error>>((resolve) => {
          serial.close((err) => resolve(err ? Err(err) : Ok()));
        });
      }

      port = null;
      opened = false;
      disconnected = false;
      disconnectError = null;
      received.length = 0;
      return result;
    },

    async write(data: Buffer): Promise<Result<number, Error>> {
      if (disconnected) {
        return Err(disconnectError ?? new Error('SERIAL_PORT_DISCONNECTED'));
      }
      const serial = port;
      if (!serial) {
        return Err(new Error('Port not opened'));
      }

      try {
        // drain() waits until the OS has transmitted the whole buffer
        await new Promise<void>((resolve, reject) => {
          serial.write(data, (writeErr) => {
            if (writeErr) {
              reject(writeErr);
              return;
            }
            serial.drain((drainErr) => {
              if (drainErr) reject(drainErr);
              else resolve();
            });
          });
        });
      } catch (e) {
        return Err(toError(e));
      }

      return Ok(data.length);
    },

    bytesAvailable(): number {
      return received.length;
    },

    readOne(): Result<number, Error> {
      const byte = received.shift();
      return byte === undefined ? Err(new Error('No data available')) : Ok(byte);
    },

    isOpen(): boolean {
      return opened && !disconnected;
    },
  };
}

// Helper to list available serial ports
export async function listSerialPorts(): Promise<Array<{ path: string; manufacturer?: string }>> {
  const ports = await SerialPort.list();
  return ports.map(p => ({
    path: p.path,
    manufacturer: p.manufacturer,
  }));
}
