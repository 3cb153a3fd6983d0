/**
 * Constructors for the instrument error union.
 * Every message names the command or argument involved so it can be
 * logged as-is.
 */

import type { ConnectFailureReason, InstrumentError } from '../../shared/types.js';

const OPEN_FAILURE_PATTERNS: Array<[RegExp, ConnectFailureReason]> = [
  [/ENOENT|no such file|not found|cannot find/i, 'port_not_found'],
  [/EACCES|EPERM|permission denied|access denied/i, 'access_denied'],
  [/EBUSY|resource busy|cannot lock port|temporarily unavailable/i, 'port_busy'],
];

/**
 * Map an open() failure from the serial layer onto a connect reason.
 * Messages differ between platforms, hence the loose matching.
 */
export function classifyOpenError(error: Error): ConnectFailureReason {
  for (const [pattern, reason] of OPEN_FAILURE_PATTERNS) {
    if (pattern.test(error.message)) return reason;
  }
  return 'unknown';
}

export const InstrumentErrors = {
  connectFailed(reason: ConnectFailureReason, detail: string, cause?: Error): InstrumentError {
    return {
      kind: 'ConnectFailed',
      reason,
      message: `Connection failed (${reason}): ${detail}`,
      cause,
    };
  },

  notConnected(): InstrumentError {
    return { kind: 'NotConnected', message: 'Instrument is not connected' };
  },

  invalidArgument(
    argument: string,
    value: number,
    validValues: readonly number[] | string
  ): InstrumentError {
    const valid = typeof validValues === 'string' ? validValues : validValues.join(', ');
    return {
      kind: 'InvalidArgument',
      argument,
      value,
      validValues,
      message: `Invalid ${argument}: ${value}. Valid values: ${valid}`,
    };
  },

  noResponse(command: string, detail?: string): InstrumentError {
    return {
      kind: 'NoResponse',
      command,
      message: detail
        ? `Unusable response to ${command}: ${detail}`
        : `No response to ${command}`,
    };
  },

  transport(cause: Error): InstrumentError {
    return { kind: 'TransportError', message: `Transport error: ${cause.message}`, cause };
  },
};
