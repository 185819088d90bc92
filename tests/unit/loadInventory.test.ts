import fs from "fs/promises";
import os from "os";
import path from "path";
import { Workbook } from "exceljs";
import {
  InventoryLoadError,
  dedupeByIp,
  loadInventory
} from "../../src/infrastructure/inventory/loadInventory";
import type { DeviceRecord } from "../../src/core/devices/device.types";

const HEADER = "org_id,site_id,ip,user_id,password";

describe("loadInventory", () => {
  let dir: string;
  let logSpy: jest.SpyInstance;

  const writeCsv = async (name: string, lines: string[]) => {
    const file = path.join(dir, name);
    await fs.writeFile(file, `${lines.join("\n")}\n`, "utf8");
    return file;
  };

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "inventory-"));
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    logSpy.mockRestore();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads devices from a CSV file in row order", async () => {
    const file = await writeCsv("devices.csv", [
      HEADER,
      "org-1,site-1,10.0.0.1,admin,test-password",
      "org-1,site-2, 10.0.0.2 ,netops,other-password"
    ]);

    const devices = await loadInventory(file);

    expect(devices).toEqual([
      { orgId: "org-1", siteId: "site-1", ip: "10.0.0.1", username: "admin", password: "test-password" },
      { orgId: "org-1", siteId: "site-2", ip: "10.0.0.2", username: "netops", password: "other-password" }
    ]);
    expect(Object.isFrozen(devices[0])).toBe(true);
    expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual({
      event: "inventory.loaded",
      file: "devices.csv",
      devices: 2
    });
  });

  it("accepts headers in any case and order, and ignores extra columns", async () => {
    const file = await writeCsv("devices.csv", [
      "IP,Password,User_ID,Site_ID,Org_ID,notes",
      "10.0.0.9,test-password,admin,site-1,org-1,rack 4"
    ]);

    await expect(loadInventory(file)).resolves.toEqual([
      { orgId: "org-1", siteId: "site-1", ip: "10.0.0.9", username: "admin", password: "test-password" }
    ]);
  });

  it("keeps the last row of a duplicated IP at that row's position", async () => {
    const file = await writeCsv("devices.csv", [
      HEADER,
      "org-1,site-1,10.0.0.1,admin,first",
      "org-1,site-1,10.0.0.2,admin,test-password",
      "org-2,site-2,10.0.0.1,admin,second"
    ]);

    const devices = await loadInventory(file);

    expect(devices.map((d) => [d.ip, d.password])).toEqual([
      ["10.0.0.2", "test-password"],
      ["10.0.0.1", "second"]
    ]);
  });

  it("rejects a file without the required columns", async () => {
    const file = await writeCsv("devices.csv", ["org_id,site_id,ip", "org-1,site-1,10.0.0.1"]);

    const error = await loadInventory(file).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(InventoryLoadError);
    expect(error).toMatchObject({
      code: "inventory_missing_columns",
      message:
        "Invalid inventory format. Required columns: org_id, site_id, ip, user_id, password (missing: user_id, password)"
    });
  });

  it("names the first incomplete row", async () => {
    const file = await writeCsv("devices.csv", [
      HEADER,
      "org-1,site-1,10.0.0.1,admin,test-password",
      ",site-1,10.0.0.2,admin,test-password"
    ]);

    await expect(loadInventory(file)).rejects.toMatchObject({
      code: "inventory_invalid_row",
      message: "Inventory row 3 is incomplete: org_id is required",
      context: { row: 3 }
    });
  });

  it("rejects a blank password", async () => {
    const file = await writeCsv("devices.csv", [HEADER, "org-1,site-1,10.0.0.1,admin,   "]);

    await expect(loadInventory(file)).rejects.toMatchObject({
      message: "Inventory row 2 is incomplete: password must not be empty"
    });
  });

  it("returns no devices for a header-only file", async () => {
    const file = await writeCsv("devices.csv", [HEADER]);

    await expect(loadInventory(file)).resolves.toEqual([]);
  });

  it("rejects unsupported extensions", async () => {
    const file = await writeCsv("devices.txt", [HEADER]);

    await expect(loadInventory(file)).rejects.toMatchObject({
      code: "inventory_unsupported",
      message: "Unsupported inventory file type '.txt'. Use .xlsx or .csv"
    });
  });

  it("reports a missing file", async () => {
    const file = path.join(dir, "absent.csv");

    await expect(loadInventory(file)).rejects.toMatchObject({
      code: "inventory_not_found",
      message: `Cannot open inventory file '${file}'`
    });
  });

  it("reads the first worksheet of an xlsx workbook", async () => {
    const workbook = new Workbook();
    const sheet = workbook.addWorksheet("Devices");
    sheet.addRow(["org_id", "site_id", "ip", "user_id", "password"]);
    sheet.addRow(["org-1", "site-1", "10.0.0.1", "admin", "test-password"]);
    sheet.addRow(["org-2", "site-3", "10.0.0.7", "netops", "test-password-2"]);
    workbook.addWorksheet("Notes").addRow(["ignored"]);
    const file = path.join(dir, "devices.xlsx");
    await workbook.xlsx.writeFile(file);

    await expect(loadInventory(file)).resolves.toEqual([
      { orgId: "org-1", siteId: "site-1", ip: "10.0.0.1", username: "admin", password: "test-password" },
      { orgId: "org-2", siteId: "site-3", ip: "10.0.0.7", username: "netops", password: "test-password-2" }
    ]);
  });
});

describe("dedupeByIp", () => {
  it("leaves unique inventories untouched", () => {
    const devices: DeviceRecord[] = [
      { orgId: "o", siteId: "s", ip: "10.0.0.1", username: "u", password: "p" },
      { orgId: "o", siteId: "s", ip: "10.0.0.2", username: "u", password: "p" }
    ];

    expect(dedupeByIp(devices)).toEqual(devices);
  });
});
