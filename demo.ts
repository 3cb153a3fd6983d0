/**
 * Demo harness for the KA3305P driver
 * Runs against real hardware (PSU_PORT) or the simulator (PSU_SIMULATE=1)
 *
 * Sets channel 1 to 13.37 V, so leave the output disconnected from
 * anything that cannot take it.
 */

import { loadConfigFromEnv } from './src/config.js';
import { listSerialPorts } from './src/devices/transports/serial.js';
import { connectKoradKA3305P, openKoradKA3305P } from './src/devices/drivers/korad-ka3305p.js';
import { createSimulatedKA3305P } from './src/devices/simulation/index.js';
import type { InstrumentClient, InstrumentError, Result } from './src/devices/types.js';

async function connect(): Promise<Result<InstrumentClient, InstrumentError> | null> {
  const config = loadConfigFromEnv();
  const options = { trace: config.trace, settleScale: config.settleScale };

  if (config.simulate) {
    console.log('Using simulated KA3305P');
    const { transport } = createSimulatedKA3305P({ loadOhms: { 1: 10 } });
    return openKoradKA3305P(transport, options);
  }

  if (!config.portPath) {
    const ports = await listSerialPorts();
    console.log('PSU_PORT not set. Available ports:');
    for (const port of ports) {
      console.log(`  ${port.path}${port.manufacturer ? ` (${port.manufacturer})` : ''}`);
    }
    return null;
  }

  console.log(`Connecting to ${config.portPath}`);
  return connectKoradKA3305P(config.portPath, options);
}

async function main(): Promise<number> {
  console.log('KA3305P Demo');
  console.log('============');

  const connection = await connect();
  if (!connection) return 1;
  if (!connection.ok) {
    console.error('Error:', connection.error.message);
    return 1;
  }

  const psu = connection.value;
  console.log('Connected');
  console.log('Status:', psu.status);

  const identity = await psu.identify();
  console.log('Identity:', identity.ok ? identity.value : identity.error.message);

  const setResult = await psu.setVoltage(1, 13.37);
  if (!setResult.ok) {
    console.error('Error:', setResult.error.message);
    await psu.close();
    return 1;
  }

  const voltage = await psu.readVoltage(1);
  console.log('  Voltage:', voltage.ok ? voltage.value : voltage.error.message, 'V');

  const status = await psu.getStatus();
  console.log('Status:', status.ok ? status.value : status.error.message);

  const closed = await psu.close();
  console.log(closed.ok ? 'Disconnected' : `Close failed: ${closed.error.message}`);
  return 0;
}

main().then(
  code => process.exit(code),
  err => {
    console.error('Error:', err);
    process.exit(1);
  }
);
