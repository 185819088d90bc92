export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

/** JSON log line that is only written when DEBUG is enabled. */
export const logDebug = (payload: { event: string } & Record<string, unknown>): void => {
  if (!isDebugMode()) return;
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(payload));
};
