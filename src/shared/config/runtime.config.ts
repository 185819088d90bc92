export const runtimeCaps = {
  mistTimeoutMs: { min: 1000, max: 60000 },
  mistRetries: { min: 0, max: 5 },
  netconfTimeoutMs: { min: 1000, max: 300000 },
  netconfPort: { min: 1, max: 65535 }
} as const;

export type RuntimeConfig = {
  mistTimeoutMs: number;
  mistRetries: number;
  netconfTimeoutMs: number;
  netconfPort: number;
};

export const defaultRuntimeConfig: RuntimeConfig = {
  mistTimeoutMs: 10000,
  mistRetries: 2,
  netconfTimeoutMs: 60000,
  netconfPort: 830
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => ({
  mistTimeoutMs:
    parseOptionalIntInRange(env, "MIST_TIMEOUT_MS", runtimeCaps.mistTimeoutMs) ?? defaultRuntimeConfig.mistTimeoutMs,
  mistRetries: parseOptionalIntInRange(env, "MIST_RETRIES", runtimeCaps.mistRetries) ?? defaultRuntimeConfig.mistRetries,
  netconfTimeoutMs:
    parseOptionalIntInRange(env, "NETCONF_TIMEOUT_MS", runtimeCaps.netconfTimeoutMs) ??
    defaultRuntimeConfig.netconfTimeoutMs,
  netconfPort: parseOptionalIntInRange(env, "NETCONF_PORT", runtimeCaps.netconfPort) ?? defaultRuntimeConfig.netconfPort
});
