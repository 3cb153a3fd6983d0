export * from './devices/types.js';
export { InstrumentErrors, classifyOpenError } from './devices/errors.js';
export { ResponseParser, STATUS_CV_BIT, STATUS_OUTPUT_BIT } from './devices/response-parser.js';
export {
  createSerialTransport,
  listSerialPorts,
  KORAD_SERIAL_OPTIONS,
  type SerialConfig,
} from './devices/transports/serial.js';
export {
  connectKoradKA3305P,
  openKoradKA3305P,
  DEFAULT_SETTLE_MS,
} from './devices/drivers/korad-ka3305p.js';
export { createSimulatedKA3305P, type SimulatedKA3305P } from './devices/simulation/index.js';
export { loadConfigFromEnv, type PsuConfig } from './config.js';
