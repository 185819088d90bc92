import type { ResultSet } from "../core/devices/device.types";
import { provisionDevices } from "../application/provision-devices/provisionDevices.usecase";
import { resolveRunSettings } from "../application/provision-devices/provisioner.config";
import { exitCodeFor, formatSummary, maskInventory } from "../application/provision-devices/provision.report";
import { resolveApiKey } from "../infrastructure/credentials/resolveApiKey";
import { loadInventory } from "../infrastructure/inventory/loadInventory";
import { MistHttpClient } from "../infrastructure/mist/MistHttpClient";
import { SshNetconfSessionFactory } from "../infrastructure/netconf/SshNetconfSessionFactory";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export type ProvisionOptions = {
  inventoryFile: string;
  keepPhoneHome?: boolean;
  maxThreads?: number;
  apiKey?: string;
  signal?: AbortSignal;
};

export type ProvisionOutcome = {
  resultSet: ResultSet;
  exitCode: number;
};

/**
 * Loads inventory and credentials (any failure here is fatal and happens
 * before a single device is touched), then runs the provisioning batch.
 */
export const runProvisioning = async (options: ProvisionOptions): Promise<ProvisionOutcome> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();

  const devices = await loadInventory(options.inventoryFile);
  // eslint-disable-next-line no-console
  console.table(maskInventory(devices));

  const { apiKey, source } = await resolveApiKey({
    flag: options.apiKey,
    envValue: env.MIST_API_KEY,
    configFile: env.MIST_CONFIG_FILE
  });
  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ event: "credential.resolved", source }));

  const settings = resolveRunSettings({
    maxConcurrency: options.maxThreads,
    keepPhoneHome: options.keepPhoneHome,
    apiKey
  });

  const client = new MistHttpClient({
    baseUrl: env.MIST_BASE_URL,
    apiKey: settings.apiKey,
    timeoutMs: runtime.mistTimeoutMs,
    retries: runtime.mistRetries
  });
  const sessions = new SshNetconfSessionFactory({
    port: runtime.netconfPort,
    timeoutMs: runtime.netconfTimeoutMs
  });

  const resultSet = await provisionDevices(devices, settings, { client, sessions, signal: options.signal });

  for (const line of formatSummary(resultSet)) {
    // eslint-disable-next-line no-console
    console.log(line);
  }

  return { resultSet, exitCode: exitCodeFor(resultSet) };
};
