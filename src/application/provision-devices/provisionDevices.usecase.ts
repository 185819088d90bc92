import type { DeviceRecord, PushResult, ResultSet } from "../../core/devices/device.types";
import { fetchKeyOf } from "../../core/devices/device.types";
import { toSetCommands, transformAdoptionConfig } from "../../core/adoption/transformAdoptionConfig";
import type { AdoptionConfigClient } from "../../ports/MistClient";
import type { DeviceSessionFactory } from "../../ports/DeviceSession";
import { createLimiter } from "../../shared/concurrency/limiter";
import { logDebug } from "../../shared/logging/debug";
import { createConfigFetchCache } from "./configFetchCache";
import type { RunSettings } from "./provisioner.config";
import { classifyTaskFailure, createResultCollector, failedResult } from "./provision.error-handler";
import { pushDevice, type PushState } from "./pushDevice";

export type ProvisionDeps = {
  client: AdoptionConfigClient;
  sessions: DeviceSessionFactory;
  signal?: AbortSignal;
  now?: () => number;
  onStateChange?: (ip: string, state: PushState) => void;
};

const logOutcome = (result: PushResult) => {
  const { device, status, category, detail, durationMs } = result;
  if (status === "success") {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ event: "device.succeeded", ip: device.ip, durationMs }));
    return;
  }
  // eslint-disable-next-line no-console
  console.warn(JSON.stringify({
    event: category === "cancelled" ? "device.cancelled" : "device.failed",
    ip: device.ip,
    orgId: device.orgId,
    siteId: device.siteId,
    category,
    detail,
    durationMs
  }));
};

/**
 * Pushes the adoption config of each device's org/site to the device, with at
 * most `settings.maxConcurrency` devices in flight. Every device yields exactly
 * one result; results are in completion order.
 */
export const provisionDevices = async (
  devices: readonly DeviceRecord[],
  settings: RunSettings,
  deps: ProvisionDeps
): Promise<ResultSet> => {
  const now = deps.now ?? Date.now;
  const limit = createLimiter(settings.maxConcurrency);
  const cache = createConfigFetchCache(deps.client);
  const collector = createResultCollector();

  const runTask = async (device: DeviceRecord): Promise<PushResult> => {
    const startedAt = now();

    // queued tasks are dropped once the run is aborted; in-flight ones stop after their current step
    if (deps.signal?.aborted) {
      return failedResult(device, "cancelled", "run aborted before the device task started", 0);
    }

    logDebug({ event: "provision.device_started", ip: device.ip, active: limit.activeCount(), pending: limit.pendingCount() });

    let raw: string;
    try {
      raw = await cache.get(fetchKeyOf(device));
    } catch (err) {
      const failure = classifyTaskFailure(err, "fetch");
      return failedResult(device, failure.category, failure.detail, now() - startedAt);
    }

    const config = transformAdoptionConfig(raw, settings.keepPhoneHome);
    logDebug({ event: "provision.config_ready", ip: device.ip, commands: toSetCommands(config).length });
    const pushed = await pushDevice(device, config, {
      sessions: deps.sessions,
      signal: deps.signal,
      now,
      onStateChange: deps.onStateChange
    });
    return Object.freeze({ ...pushed, durationMs: now() - startedAt });
  };

  await Promise.all(
    devices.map((device) =>
      limit(async () => {
        const result = await runTask(device);
        collector.add(result);
        logOutcome(result);
      })
    )
  );

  const resultSet = collector.resultSet();
  // eslint-disable-next-line no-console
  console.log(JSON.stringify({
    event: "provision.completed",
    devices: devices.length,
    succeeded: resultSet.succeeded,
    failed: resultSet.failed,
    byCategory: resultSet.byCategory,
    cachedConfigs: cache.size()
  }));
  return resultSet;
};
