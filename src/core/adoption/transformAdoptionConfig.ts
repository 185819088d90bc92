export const PHONE_HOME_DIRECTIVE = "delete system phone-home";

/**
 * Prepares the adoption configuration returned by Mist for a push.
 *
 * Unless `keepPhoneHome` is set, every line containing the phone-home
 * directive is dropped. Retained lines are kept byte-for-byte (including
 * `\r` and trailing empty segments) and in their original order.
 */
export const transformAdoptionConfig = (raw: string, keepPhoneHome: boolean): string => {
  if (keepPhoneHome) return raw;

  return raw
    .split("\n")
    .filter((line) => !line.includes(PHONE_HOME_DIRECTIVE))
    .join("\n");
};

export const toSetCommands = (config: string): string[] =>
  config
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
