import fs from "fs/promises";
import path from "path";
import { parse as parseCsv } from "csv-parse/sync";
import { Workbook } from "exceljs";
import { z } from "zod";
import type { DeviceRecord } from "../../core/devices/device.types";

export const REQUIRED_COLUMNS = ["org_id", "site_id", "ip", "user_id", "password"] as const;

export type InventoryLoadErrorCode =
  | "inventory_not_found"
  | "inventory_unsupported"
  | "inventory_missing_columns"
  | "inventory_invalid_row";

export class InventoryLoadError extends Error {
  readonly code: InventoryLoadErrorCode;
  readonly context?: { row?: number };

  constructor(code: InventoryLoadErrorCode, message: string, context?: { row?: number }) {
    super(message);
    this.name = "InventoryLoadError";
    this.code = code;
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const requiredText = z.string({ required_error: "is required" }).trim().min(1, "must not be empty");

const inventoryRowSchema = z.object({
  org_id: requiredText,
  site_id: requiredText,
  ip: requiredText,
  user_id: requiredText,
  password: z
    .string({ required_error: "is required" })
    .refine((value) => value.trim().length > 0, "must not be empty")
});

type RawRow = Record<string, string | undefined>;

type RawTable = {
  columns: string[];
  rows: RawRow[];
};

const normalizeHeader = (header: string): string => header.trim().toLowerCase();

const readCsv = (content: string): RawTable => {
  const records: unknown = parseCsv(content, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true
  });
  const lines = Array.isArray(records) ? records.filter((r): r is unknown[] => Array.isArray(r)) : [];
  const [header = [], ...body] = lines;
  const columns = header.map((cell) => normalizeHeader(String(cell)));

  const rows = body.map((cells) => {
    const record: RawRow = {};
    columns.forEach((column, index) => {
      const value = cells[index];
      if (typeof value === "string" && value !== "") record[column] = value;
    });
    return record;
  });

  return { columns, rows };
};

const readXlsx = async (filePath: string): Promise<RawTable> => {
  const workbook = new Workbook();
  await workbook.xlsx.readFile(filePath);
  const sheet = workbook.worksheets[0];
  if (!sheet) return { columns: [], rows: [] };

  const headers = new Map<number, string>();
  sheet.getRow(1).eachCell((cell, colNumber) => {
    headers.set(colNumber, normalizeHeader(cell.text));
  });

  const rows: RawRow[] = [];
  sheet.eachRow((row, rowNumber) => {
    if (rowNumber === 1) return;
    const record: RawRow = {};
    row.eachCell({ includeEmpty: true }, (cell, colNumber) => {
      const header = headers.get(colNumber);
      if (header && cell.text !== "") record[header] = cell.text;
    });
    rows.push(record);
  });

  return { columns: [...headers.values()], rows };
};

const readTable = async (filePath: string): Promise<RawTable> => {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === ".csv") {
    return readCsv(await fs.readFile(filePath, "utf8"));
  }
  if (extension === ".xlsx") {
    return readXlsx(filePath);
  }
  throw new InventoryLoadError(
    "inventory_unsupported",
    `Unsupported inventory file type '${extension || "(none)"}'. Use .xlsx or .csv`
  );
};

const assertReadable = async (filePath: string): Promise<void> => {
  try {
    await fs.access(filePath);
  } catch {
    throw new InventoryLoadError("inventory_not_found", `Cannot open inventory file '${filePath}'`);
  }
};

/** Later rows override earlier rows with the same IP, at the later row's position. */
export const dedupeByIp = (devices: DeviceRecord[]): DeviceRecord[] => {
  const lastIndexByIp = new Map<string, number>();
  devices.forEach((device, index) => lastIndexByIp.set(device.ip, index));
  return devices.filter((device, index) => lastIndexByIp.get(device.ip) === index);
};

export const toDeviceRecords = (table: RawTable): DeviceRecord[] => {
  const missing = REQUIRED_COLUMNS.filter((column) => !table.columns.includes(column));
  if (missing.length > 0) {
    throw new InventoryLoadError(
      "inventory_missing_columns",
      `Invalid inventory format. Required columns: ${REQUIRED_COLUMNS.join(", ")} (missing: ${missing.join(", ")})`
    );
  }

  const devices = table.rows.map((raw, index): DeviceRecord => {
    const row = index + 2;
    const parsed = inventoryRowSchema.safeParse(raw);
    if (!parsed.success) {
      const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`).join(", ");
      throw new InventoryLoadError("inventory_invalid_row", `Inventory row ${row} is incomplete: ${problems}`, { row });
    }

    return Object.freeze({
      orgId: parsed.data.org_id,
      siteId: parsed.data.site_id,
      ip: parsed.data.ip,
      username: parsed.data.user_id,
      password: parsed.data.password
    });
  });

  return dedupeByIp(devices);
};

export const loadInventory = async (filePath: string): Promise<DeviceRecord[]> => {
  await assertReadable(filePath);
  const devices = toDeviceRecords(await readTable(filePath));

  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ event: "inventory.loaded", file: path.basename(filePath), devices: devices.length }));
  return devices;
};
