/**
 * Configuration (defaults, overridable by ENV)
 *
 *   PSU_PORT          - Serial device path, e.g. /dev/ttyACM0 or COM3
 *   PSU_SIMULATE      - "1" or "true" to run against the simulator
 *   PSU_TRACE         - "1" or "true" to log every command and reply
 *   PSU_SETTLE_SCALE  - Multiplier for settle delays (default: 1)
 */

export interface PsuConfig {
  portPath: string | null;
  simulate: boolean;
  trace: boolean;
  settleScale: number;
}

const parseFlag = (value: string | undefined): boolean =>
  value !== undefined && /^(1|true|yes|on)$/i.test(value.trim());

const parsePositive = (value: string | undefined, defaultVal: number): number => {
  if (!value) return defaultVal;
  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) || parsed <= 0 ? defaultVal : parsed;
};

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PsuConfig {
  return {
    portPath: env.PSU_PORT?.trim() || null,
    simulate: parseFlag(env.PSU_SIMULATE),
    trace: parseFlag(env.PSU_TRACE),
    settleScale: parsePositive(env.PSU_SETTLE_SCALE, 1),
  };
}
