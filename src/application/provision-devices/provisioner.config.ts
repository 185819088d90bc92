export type RunSettings = Readonly<{
  maxConcurrency: number;
  keepPhoneHome: boolean;
  apiKey: string;
}>;

export type RunSettingsInput = Partial<RunSettings> & { apiKey: string };

export const defaultRunSettings = {
  maxConcurrency: 10,
  keepPhoneHome: false
} as const;

export class SettingsError extends Error {
  readonly code = "settings_invalid";

  constructor(message: string) {
    super(message);
    this.name = "SettingsError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const validateRunSettings = (settings: RunSettings): RunSettings => {
  if (!Number.isSafeInteger(settings.maxConcurrency) || settings.maxConcurrency < 1) {
    throw new SettingsError(`maxConcurrency=${String(settings.maxConcurrency)} must be a positive integer`);
  }
  if (settings.apiKey.trim() === "") {
    throw new SettingsError("apiKey must not be empty");
  }
  return settings;
};

/** Applies defaults, validates, and freezes: settings never change during a run. */
export const resolveRunSettings = (input: RunSettingsInput): RunSettings =>
  Object.freeze(
    validateRunSettings({
      maxConcurrency: input.maxConcurrency ?? defaultRunSettings.maxConcurrency,
      keepPhoneHome: input.keepPhoneHome ?? defaultRunSettings.keepPhoneHome,
      apiKey: input.apiKey
    })
  );
