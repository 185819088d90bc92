import { Client } from "ssh2";
import type { DeviceSession, DeviceSessionFactory, DeviceTarget } from "../../ports/DeviceSession";
import { DeviceSessionError, toErrorMessage } from "../../core/errors";
import { NetconfDeviceSession, type NetconfStream, type NetconfTransport } from "./NetconfDeviceSession";

export type SshNetconfOptions = {
  port: number;
  timeoutMs: number;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

/** ssh2 tags failures with `level`; authentication ones are `client-authentication`. */
export const classifySshError = (err: unknown, host: string): DeviceSessionError => {
  if (isRecord(err) && err.level === "client-authentication") {
    return new DeviceSessionError("auth", `Authentication failed on ${host}: ${toErrorMessage(err)}`, err);
  }
  if (isRecord(err) && err.level === "client-timeout") {
    return new DeviceSessionError("connect", `Timed out connecting to ${host}: ${toErrorMessage(err)}`, err);
  }
  return new DeviceSessionError("connect", `Unable to establish NETCONF session with ${host}: ${toErrorMessage(err)}`, err);
};

/**
 * NETCONF subsystem over SSH with username/password only: no agent, no key
 * files, and no host key pinning (adoption targets are factory-fresh).
 */
export class SshNetconfTransport implements NetconfTransport {
  constructor(private readonly opts: SshNetconfOptions) {}

  open(target: DeviceTarget): Promise<NetconfStream> {
    const { host, username, password } = target;

    return new Promise<NetconfStream>((resolve, reject) => {
      const conn = new Client();
      let settled = false;

      conn.on("keyboard-interactive", (_name, _instructions, _lang, prompts, finish) => {
        finish(prompts.map(() => password));
      });

      conn.on("error", (err) => {
        if (settled) return;
        settled = true;
        conn.end();
        reject(classifySshError(err, host));
      });

      conn.on("ready", () => {
        conn.subsys("netconf", (err, stream) => {
          if (settled) return;
          settled = true;
          if (err) {
            conn.end();
            reject(new DeviceSessionError("connect", `NETCONF subsystem unavailable on ${host}: ${err.message}`, err));
            return;
          }
          resolve({ stream, end: () => conn.end() });
        });
      });

      conn.connect({
        host,
        port: this.opts.port,
        username,
        password,
        tryKeyboard: true,
        readyTimeout: this.opts.timeoutMs
      });
    });
  }
}

export class SshNetconfSessionFactory implements DeviceSessionFactory {
  private readonly transport: NetconfTransport;

  constructor(private readonly opts: SshNetconfOptions, transport?: NetconfTransport) {
    this.transport = transport ?? new SshNetconfTransport(opts);
  }

  create(target: DeviceTarget): DeviceSession {
    return new NetconfDeviceSession(target, this.transport, this.opts.timeoutMs);
  }
}
