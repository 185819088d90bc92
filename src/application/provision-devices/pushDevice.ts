import type { DeviceRecord, PushResult } from "../../core/devices/device.types";
import { identityOf } from "../../core/devices/device.types";
import { RunAbortedError, toErrorMessage } from "../../core/errors";
import type { DeviceSession, DeviceSessionFactory } from "../../ports/DeviceSession";
import { logDebug } from "../../shared/logging/debug";
import { classifyTaskFailure } from "./provision.error-handler";

export type PushState =
  | "disconnected"
  | "connecting"
  | "authenticated"
  | "config_loaded"
  | "committed"
  | "closed"
  | "errored";

export type PushDeviceDeps = {
  sessions: DeviceSessionFactory;
  signal?: AbortSignal;
  now?: () => number;
  onStateChange?: (ip: string, state: PushState) => void;
};

/**
 * Drives one device through connect, load, commit. Never rejects and never
 * retries; the session is closed on every path, and a failing close is only
 * logged. An aborted `signal` is honoured between steps: the step in
 * progress finishes, the next one is not started.
 */
export const pushDevice = async (device: DeviceRecord, config: string, deps: PushDeviceDeps): Promise<PushResult> => {
  const now = deps.now ?? Date.now;
  const startedAt = now();
  const { ip } = device;

  const transition = (state: PushState) => {
    deps.onStateChange?.(ip, state);
    logDebug({ event: "device.state", ip, state });
  };

  const throwIfAborted = () => {
    if (deps.signal?.aborted) throw new RunAbortedError();
  };

  let session: DeviceSession | undefined;
  let result: Omit<PushResult, "durationMs">;
  try {
    throwIfAborted();
    transition("connecting");
    session = deps.sessions.create({ host: ip, username: device.username, password: device.password });
    await session.connect();
    transition("authenticated");
    throwIfAborted();
    await session.loadConfiguration(config);
    transition("config_loaded");
    throwIfAborted();
    await session.commit();
    transition("committed");
    result = { device: identityOf(device), status: "success" };
  } catch (err) {
    transition("errored");
    const failure = classifyTaskFailure(err, "push");
    result = { device: identityOf(device), status: "failed", category: failure.category, detail: failure.detail };
  } finally {
    if (session) {
      try {
        await session.close();
      } catch (closeErr) {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({ event: "netconf.close_failed", ip, reason: toErrorMessage(closeErr) }));
      }
    }
  }
  transition("closed");

  return Object.freeze({ ...result, durationMs: now() - startedAt });
};
