/**
 * Reply Parser
 *
 * Utilities for interpreting replies from Korad-protocol power supplies.
 * Numeric replies are fixed-point text with no unit or terminator
 * ("12.00", "1.500"); STATUS? answers with a single raw byte.
 */

import { Result, Ok, Err } from '../../shared/types.js';
import type { InstrumentIdentity, StatusSnapshot } from '../../shared/types.js';

/** Bit 0: channel 1 regulation, clear = constant current */
export const STATUS_CV_BIT = 1 << 0;

/** Bit 6: output relay */
export const STATUS_OUTPUT_BIT = 1 << 6;

export const ResponseParser = {
  /**
   * Parse a numeric reply.
   *
   * @param response - Raw reply text
   * @returns Result with parsed number, or error string describing the issue
   */
  parseNumber(response: string): Result<number, string> {
    const trimmed = response.trim();

    if (trimmed === '') {
      return Err('empty response');
    }

    // Number() rejects trailing garbage that parseFloat would silently drop
    const value = Number(trimmed);

    if (Number.isNaN(value)) {
      return Err(`non-numeric response: "${trimmed}"`);
    }

    return Ok(value);
  },

  /**
   * Decode the STATUS? byte. Only the regulation and output bits are
   * modelled; the rest are model specific.
   */
  decodeStatus(byte: number): StatusSnapshot {
    return Object.freeze({
      mode: (byte & STATUS_CV_BIT) === 0 ? 'CC' : 'CV',
      output: (byte & STATUS_OUTPUT_BIT) === 0 ? 'Off' : 'On',
    });
  },

  /**
   * Parse an *IDN? reply such as "KORAD KA3305P V5.8 SN:03379314".
   * Version and serial are optional; older firmware omits the serial.
   */
  parseIdentity(response: string): Result<InstrumentIdentity, string> {
    const tokens = response.trim().split(/\s+/).filter(t => t !== '');
    if (tokens.length < 2) {
      return Err(`unrecognised identity: "${response.trim()}"`);
    }

    const [manufacturer, model, ...rest] = tokens;
    const identity: InstrumentIdentity = { manufacturer, model };

    for (const token of rest) {
      if (/^SN:/i.test(token)) {
        identity.serial = token.slice(3);
      } else if (/^V\d/i.test(token)) {
        identity.version = token.slice(1);
      }
    }

    return Ok(identity);
  },
};
