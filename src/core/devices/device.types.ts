export type DeviceRecord = Readonly<{
  orgId: string;
  siteId: string;
  ip: string;
  username: string;
  password: string;
}>;

export type FetchKey = Readonly<{
  orgId: string;
  siteId: string;
}>;

export const fetchKeyOf = (device: DeviceRecord): FetchKey => ({ orgId: device.orgId, siteId: device.siteId });

export const serializeFetchKey = (key: FetchKey): string => `${key.orgId}/${key.siteId}`;

/** Identity of a device as it appears in results and logs (never carries credentials). */
export type DeviceIdentity = Readonly<{
  ip: string;
  orgId: string;
  siteId: string;
}>;

export const identityOf = (device: DeviceRecord): DeviceIdentity => ({
  ip: device.ip,
  orgId: device.orgId,
  siteId: device.siteId
});

export type FailureCategory =
  | "fetch_error"
  | "connect_error"
  | "auth_error"
  | "load_error"
  | "commit_error"
  | "cancelled";

export type PushStatus = "success" | "failed";

export type PushResult = Readonly<{
  device: DeviceIdentity;
  status: PushStatus;
  category?: FailureCategory;
  detail?: string;
  durationMs: number;
}>;

export type ResultSet = {
  results: PushResult[];
  succeeded: number;
  failed: number;
  byCategory: Partial<Record<FailureCategory, number>>;
};
