import { DeviceSessionError, FetchError, RunAbortedError, toErrorMessage } from "../../core/errors";
import type { DeviceRecord, FailureCategory, PushResult, ResultSet } from "../../core/devices/device.types";
import { identityOf } from "../../core/devices/device.types";

export type TaskStage = "fetch" | "push";

export type TaskFailure = {
  category: FailureCategory;
  detail: string;
};

const sessionCategories = {
  connect: "connect_error",
  auth: "auth_error",
  load: "load_error",
  commit: "commit_error"
} as const;

/**
 * Maps anything a device task can throw to a result category. Errors never
 * leave the task; the orchestrator only ever sees results.
 */
export const classifyTaskFailure = (reason: unknown, stage: TaskStage): TaskFailure => {
  if (reason instanceof FetchError) {
    return { category: "fetch_error", detail: `${reason.code}: ${reason.message}` };
  }
  if (reason instanceof RunAbortedError) {
    return { category: "cancelled", detail: reason.message };
  }
  if (reason instanceof DeviceSessionError) {
    return { category: sessionCategories[reason.category], detail: reason.message };
  }
  return {
    category: stage === "fetch" ? "fetch_error" : "connect_error",
    detail: toErrorMessage(reason)
  };
};

export const failedResult = (
  device: DeviceRecord,
  category: FailureCategory,
  detail: string,
  durationMs: number
): PushResult => {
  const result: PushResult = { device: identityOf(device), status: "failed", category, detail, durationMs };
  return Object.freeze(result);
};

export const createResultCollector = () => {
  const results: PushResult[] = [];
  let succeeded = 0;
  const byCategory: Partial<Record<FailureCategory, number>> = {};

  return {
    add: (result: PushResult) => {
      results.push(result);
      if (result.status === "success") {
        succeeded += 1;
      } else if (result.category) {
        byCategory[result.category] = (byCategory[result.category] ?? 0) + 1;
      }
    },
    size: () => results.length,
    resultSet: (): ResultSet => ({
      results: [...results],
      succeeded,
      failed: results.length - succeeded,
      byCategory: { ...byCategory }
    })
  };
};
