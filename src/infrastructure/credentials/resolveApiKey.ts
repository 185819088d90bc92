import fs from "fs/promises";
import { parse as parseIni } from "ini";

export type CredentialErrorCode = "credential_missing" | "credential_file_invalid";

export class CredentialError extends Error {
  readonly code: CredentialErrorCode;

  constructor(code: CredentialErrorCode, message: string) {
    super(message);
    this.name = "CredentialError";
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type ApiKeySource = "flag" | "env" | "config_file";

export type ResolvedApiKey = {
  apiKey: string;
  source: ApiKeySource;
};

const nonBlank = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const readConfigFile = async (configFile: string): Promise<string | undefined> => {
  try {
    return await fs.readFile(configFile, "utf8");
  } catch (err) {
    if (isRecord(err) && err.code === "ENOENT") return undefined;
    throw new CredentialError(
      "credential_file_invalid",
      `Cannot read Mist config file '${configFile}': ${err instanceof Error ? err.message : String(err)}`
    );
  }
};

/** `[Mist]` / `api_key` entry of an INI file, if any. */
export const readApiKeyFromConfigFile = async (configFile: string): Promise<string | undefined> => {
  const content = await readConfigFile(configFile);
  if (content === undefined) return undefined;

  const section: unknown = parseIni(content).Mist;
  if (!isRecord(section)) return undefined;
  return typeof section.api_key === "string" ? nonBlank(section.api_key) : undefined;
};

/**
 * Precedence: explicit flag, then `MIST_API_KEY`, then the config file.
 */
export const resolveApiKey = async (args: {
  flag?: string;
  envValue?: string;
  configFile: string;
}): Promise<ResolvedApiKey> => {
  const fromFlag = nonBlank(args.flag);
  if (fromFlag) return { apiKey: fromFlag, source: "flag" };

  const fromEnv = nonBlank(args.envValue);
  if (fromEnv) return { apiKey: fromEnv, source: "env" };

  const fromFile = await readApiKeyFromConfigFile(args.configFile);
  if (fromFile) return { apiKey: fromFile, source: "config_file" };

  throw new CredentialError(
    "credential_missing",
    `Mist API key not found: pass --api-key, set MIST_API_KEY, or add api_key under [Mist] in ${args.configFile}`
  );
};
