import type { FetchKey } from "../../core/devices/device.types";
import { serializeFetchKey } from "../../core/devices/device.types";
import type { AdoptionConfigClient } from "../../ports/MistClient";

export type ConfigFetchCache = {
  get: (key: FetchKey) => Promise<string>;
  size: () => number;
};

/**
 * Single-flight cache of adoption configs for one run. Lookup and insertion
 * of the in-flight promise happen in the same tick, so concurrent callers
 * for a key always share one API call. Rejected entries are evicted.
 */
export const createConfigFetchCache = (client: AdoptionConfigClient): ConfigFetchCache => {
  const entries = new Map<string, Promise<string>>();

  const get = (key: FetchKey): Promise<string> => {
    const id = serializeFetchKey(key);
    const existing = entries.get(id);
    if (existing) return existing;

    const pending: Promise<string> = client.fetchAdoptionConfig(key.orgId, key.siteId).catch((err: unknown) => {
      if (entries.get(id) === pending) entries.delete(id);
      throw err;
    });
    entries.set(id, pending);
    return pending;
  };

  return { get, size: () => entries.size };
};
