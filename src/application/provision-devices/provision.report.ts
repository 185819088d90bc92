import type { DeviceRecord, ResultSet } from "../../core/devices/device.types";

export type MaskedInventoryRow = {
  org_id: string;
  site_id: string;
  ip: string;
  user_id: string;
  password: string;
};

export const EXIT_OK = 0;
export const EXIT_DEVICE_FAILURES = 2;

export const maskInventory = (devices: readonly DeviceRecord[]): MaskedInventoryRow[] =>
  devices.map((device) => ({
    org_id: device.orgId,
    site_id: device.siteId,
    ip: device.ip,
    user_id: device.username,
    password: "*".repeat(device.password.length)
  }));

const compareIps = (a: string, b: string) => a.localeCompare(b, "en", { numeric: true });

/** One line per device, ordered by IP, then a totals line. */
export const formatSummary = (resultSet: ResultSet): string[] => {
  const lines = [...resultSet.results]
    .sort((a, b) => compareIps(a.device.ip, b.device.ip))
    .map((result) => {
      if (result.status === "success") return `${result.device.ip}: OK`;
      const detail = result.detail ? ` ${result.detail}` : "";
      return `${result.device.ip}: FAILED [${result.category ?? "unknown"}]${detail}`;
    });

  return [...lines, `${resultSet.succeeded} succeeded, ${resultSet.failed} failed`];
};

export const exitCodeFor = (resultSet: ResultSet): number =>
  resultSet.failed === 0 ? EXIT_OK : EXIT_DEVICE_FAILURES;
