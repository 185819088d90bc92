import os from "os";
import path from "path";

export type Env = {
  MIST_BASE_URL: string;
  MIST_API_KEY?: string;
  MIST_CONFIG_FILE: string;
};

export const defaultMistBaseUrl = "https://api.mist.com/api/v1";

export const defaultMistConfigFile = (): string => path.join(os.homedir(), ".mist", "config.ini");

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const optionalTrimmed = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MIST_BASE_URL = validateHttpUrl("MIST_BASE_URL", optionalTrimmed(env.MIST_BASE_URL) ?? defaultMistBaseUrl);
  const MIST_API_KEY = optionalTrimmed(env.MIST_API_KEY);
  const MIST_CONFIG_FILE = optionalTrimmed(env.MIST_CONFIG_FILE) ?? defaultMistConfigFile();

  return { MIST_BASE_URL, MIST_API_KEY, MIST_CONFIG_FILE };
};
