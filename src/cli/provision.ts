#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { runProvisioning, type ProvisionOptions, type ProvisionOutcome } from "../composition/root";
import { isDebugMode } from "../shared/logging/debug";

type CliErrorEnvelope = {
  event: "provision.failed";
  name: string;
  message: string;
  code?: string;
  row?: number;
  stack?: string;
};

export const EXIT_FATAL = 1;
export const EXIT_FORCED = 130;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const inventoryRowOf = (err: Record<string, unknown>): number | undefined => {
  const { context } = err;
  return isRecord(context) && typeof context.row === "number" ? context.row : undefined;
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const fields: Record<string, unknown> = isRecord(err) ? err : {};
  const row = inventoryRowOf(fields);

  return {
    event: "provision.failed",
    name: error.name || "Error",
    message: error.message,
    ...(typeof fields.code === "string" ? { code: fields.code } : {}),
    ...(row !== undefined ? { row } : {}),
    ...(includeStack && error.stack ? { stack: error.stack } : {})
  };
};

export const parseMaxThreads = (value: string): number => {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return parsed;
};

type CliFlags = {
  keepPhoneHome: boolean;
  maxThreads: number;
  apiKey?: string;
};

export const buildProgram = (onRun: (options: Omit<ProvisionOptions, "signal">) => Promise<void>): Command =>
  new Command()
    .name("adopt-fleet")
    .description("Push the Mist adoption configuration to every device listed in an inventory file")
    .version("0.1.0")
    .argument("<inventory-file>", "inventory (.xlsx or .csv) with columns org_id, site_id, ip, user_id, password")
    .option("-k, --keep-phone-home", "keep the 'delete system phone-home' command in the configuration", false)
    .option("-t, --max-threads <n>", "maximum number of devices provisioned concurrently", parseMaxThreads, 10)
    .option("-a, --api-key <key>", "Mist API key (overrides MIST_API_KEY and ~/.mist/config.ini)")
    .action(async (inventoryFile: string, flags: CliFlags) => {
      await onRun({
        inventoryFile,
        keepPhoneHome: flags.keepPhoneHome,
        maxThreads: flags.maxThreads,
        apiKey: flags.apiKey
      });
    });

/**
 * First signal: stop dispatching and let in-flight devices finish their
 * current step and close. Second signal: exit immediately.
 */
export const createSignalHandler = (controller: AbortController, exit: (code: number) => void = process.exit) =>
  (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      // eslint-disable-next-line no-console
      console.error(JSON.stringify({ event: "provision.signal", signal, action: "exit" }));
      exit(EXIT_FORCED);
      return;
    }
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({ event: "provision.signal", signal, action: "drain" }));
    controller.abort();
  };

export const executeProvisionCli = async (argv: string[] = process.argv): Promise<void> => {
  const controller = new AbortController();
  const onSignal = createSignalHandler(controller);
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    const run: { outcome?: ProvisionOutcome } = {};
    const program = buildProgram(async (options) => {
      run.outcome = await runProvisioning({ ...options, signal: controller.signal });
    });
    await program.parseAsync(argv);
    if (run.outcome) process.exitCode = run.outcome.exitCode;
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(EXIT_FATAL);
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
};

if (require.main === module) {
  void executeProvisionCli();
}
