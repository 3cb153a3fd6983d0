import { describe, it, expect, beforeEach, vi } from 'vitest';

interface FakePort {
  options: Record<string, unknown>;
  written: Buffer[];
  closeCalls: number;
  isOpen: boolean;
  emit(event: string, ...args: unknown[]): boolean;
  listenerCount(event: string): number;
}

interface SerialState {
  instances: FakePort[];
  constructError: Error | null;
  openError: Error | null;
  writeError: Error | null;
  portList: Array<{ path: string; manufacturer?: string }>;
}

const serialState = vi.hoisted((): SerialState => ({
  instances: [],
  constructError: null,
  openError: null,
  writeError: null,
  portList: [],
}));

// Mock SerialPort before importing
vi.mock('serialport', async () => {
  const { EventEmitter } = await import('node:events');

  class SerialPort extends EventEmitter {
    static list = async () => serialState.portList;

    options: Record<string, unknown>;
    written: Buffer[] = [];
    closeCalls = 0;
    isOpen = false;

    constructor(options: Record<string, unknown>) {
      super();
      if (serialState.constructError) throw serialState.constructError;
      this.options = options;
      serialState.instances.push(this);
      // The OS closed the device (unplugged)
      this.on('close', () => {
        this.isOpen = false;
      });
    }

    open(cb: (err: Error | null) => void): void {
      if (!serialState.openError) this.isOpen = true;
      cb(serialState.openError);
    }

    write(data: Buffer, cb: (err: Error | null) => void): boolean {
      if (!serialState.writeError) this.written.push(Buffer.from(data));
      cb(serialState.writeError);
      return true;
    }

    drain(cb: (err: Error | null) => void): void {
      cb(null);
    }

    close(cb: (err: Error | null) => void): void {
      this.closeCalls++;
      this.isOpen = false;
      cb(null);
    }
  }

  return { SerialPort };
});

import { createSerialTransport, listSerialPorts } from '../transports/serial.js';
import { connectKoradKA3305P } from '../drivers/korad-ka3305p.js';

function lastPort(): FakePort {
  const port = serialState.instances[serialState.instances.length - 1];
  if (!port) throw new Error('no SerialPort constructed');
  return port;
}

describe('Serial Transport', () => {
  beforeEach(() => {
    serialState.instances.length = 0;
    serialState.constructError = null;
    serialState.openError = null;
    serialState.writeError = null;
    serialState.portList = [];
  });

  describe('open()', () => {
    it('should open the port at 9600 8N1 by default', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyACM0' });
      const result = await transport.open();

      expect(result.ok).toBe(true);
      expect(transport.isOpen()).toBe(true);
      expect(lastPort().options).toEqual({
        path: '/dev/ttyACM0',
        baudRate: 9600,
        dataBits: 8,
        parity: 'none',
        stopBits: 1,
        autoOpen: false,
      });
    });

    it('should be idempotent when already open', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyACM0' });
      await transport.open();
      await transport.open();
      expect(serialState.instances).toHaveLength(1);
    });

    it('should return the open error and stay closed', async () => {
      serialState.openError = new Error('Error: Permission denied, cannot open /dev/ttyACM0');
      const transport = createSerialTransport({ path: '/dev/ttyACM0' });
      const result = await transport.open();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Error: Permission denied, cannot open /dev/ttyACM0');
      }
      expect(transport.isOpen()).toBe(false);
      expect(lastPort().listenerCount('data')).toBe(0);
    });

    it('should return an error when the SerialPort constructor throws', async () => {
      serialState.constructError = new TypeError('"path" is not defined: ');
      const transport = createSerialTransport({ path: '' });
      const result = await transport.open();

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('"path" is not defined: ');
      expect(transport.isOpen()).toBe(false);
      expect(serialState.instances).toHaveLength(0);
    });
  });

  describe('write()', () => {
    it('should write the bytes and report the count', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyACM0' });
      await transport.open();

      const result = await transport.write(Buffer.from('VSET1:13.37', 'latin1'));
      expect(result).toEqual({ ok: true, value: 11 });
      expect(lastPort().written.map(b => b.toString('latin1'))).toEqual(['VSET1:13.37']);
    });

    it('should fail before open', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyACM0' });
      const result = await transport.write(Buffer.from('OUT1'));
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Port not opened');
    });

    it('should return write errors', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyACM0' });
      await transport.open();
      serialState.writeError = new Error('EIO');

      const result = await transport.write(Buffer.from('OUT1'));
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('EIO');
    });
  });

  describe('receive buffer', () => {
    it('should queue incoming bytes and hand them out one at a time', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyACM0' });
      await transport.open();

      lastPort().emit('data', Buffer.from('12'));
      lastPort().emit('data', Buffer.from([0x2e, 0xb0]));

      expect(transport.bytesAvailable()).toBe(4);
      const bytes: number[] = [];
      while (transport.bytesAvailable() > 0) {
        const byte = transport.readOne();
        if (byte.ok) bytes.push(byte.value);
      }
      expect(bytes).toEqual([0x31, 0x32, 0x2e, 0xb0]);
    });

    it('should return an error when reading an empty buffer', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyACM0' });
      await transport.open();
      const result = transport.readOne();
      expect(result.ok).toBe(false);
    });
  });

  describe('close()', () => {
    it('should close the port and drop buffered bytes', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyACM0' });
      await transport.open();
      lastPort().emit('data', Buffer.from('5.00'));

      const result = await transport.close();
      expect(result.ok).toBe(true);
      expect(lastPort().closeCalls).toBe(1);
      expect(transport.isOpen()).toBe(false);
      expect(transport.bytesAvailable()).toBe(0);
    });

    it('should remove all listeners before closing', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyACM0' });
      await transport.open();
      await transport.close();
      expect(lastPort().listenerCount('data')).toBe(0);
      expect(lastPort().listenerCount('close')).toBe(0);
    });

    it('should be a no-op before open', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyACM0' });
      expect(await transport.close()).toEqual({ ok: true, value: undefined });
    });
  });

  describe('disconnection detection', () => {
    it('should mark as disconnected on close event', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyACM0' });
      await transport.open();

      lastPort().emit('close');

      expect(transport.isOpen()).toBe(false);
      const result = await transport.write(Buffer.from('OUT1'));
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('SERIAL_PORT_DISCONNECTED: Port closed');
    });

    it('should mark as disconnected on error event', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyACM0' });
      await transport.open();

      lastPort().emit('error', new Error('USB cable unplugged'));

      expect(transport.isOpen()).toBe(false);
      const result = await transport.write(Buffer.from('OUT1'));
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('SERIAL_PORT_ERROR: USB cable unplugged');
    });

    it('should not close a port that already went away', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyACM0' });
      await transport.open();
      lastPort().emit('close');

      await transport.close();
      expect(lastPort().closeCalls).toBe(0);
    });

    it('should still close the OS handle after an error event', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyACM0' });
      await transport.open();
      lastPort().emit('error', new Error('framing error'));

      expect(await transport.close()).toEqual({ ok: true, value: undefined });
      expect(lastPort().closeCalls).toBe(1);
    });
  });

  describe('connectKoradKA3305P()', () => {
    it('should return ConnectFailed instead of throwing on an invalid path', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      serialState.constructError = new TypeError('"path" is not defined: ');

      const result = await connectKoradKA3305P('');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toMatchObject({
          kind: 'ConnectFailed',
          reason: 'unknown',
          message: 'Connection failed (unknown): "path" is not defined: ',
        });
      }
      expect(warn).toHaveBeenCalledTimes(1);
      warn.mockRestore();
    });
  });

  describe('listSerialPorts()', () => {
    it('should return path and manufacturer', async () => {
      serialState.portList = [
        { path: '/dev/ttyACM0', manufacturer: 'Nuvoton' },
        { path: '/dev/ttyS0' },
      ];
      expect(await listSerialPorts()).toEqual([
        { path: '/dev/ttyACM0', manufacturer: 'Nuvoton' },
        { path: '/dev/ttyS0', manufacturer: undefined },
      ]);
    });
  });
});
