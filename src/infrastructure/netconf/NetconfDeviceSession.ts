import type { Duplex } from "stream";
import type { DeviceSession, DeviceTarget } from "../../ports/DeviceSession";
import { DeviceSessionError, toErrorMessage, type DeviceSessionErrorCategory } from "../../core/errors";
import { NetconfChannel } from "./NetconfChannel";
import { escapeXml, fatalErrors, type RpcReply } from "./rpcReply";

export type NetconfStream = {
  stream: Duplex;
  /** Tears down whatever carries the stream (the SSH connection). */
  end: () => void;
};

export interface NetconfTransport {
  /** Rejects with a `connect` or `auth` DeviceSessionError and leaves nothing open. */
  open(target: DeviceTarget): Promise<NetconfStream>;
}

const describeErrors = (reply: RpcReply): string =>
  fatalErrors(reply)
    .map((e) => e.message)
    .join("; ");

/**
 * Junos candidate-configuration workflow over NETCONF:
 * hello, `load-configuration action="set"`, `commit`, `close-session`.
 */
export class NetconfDeviceSession implements DeviceSession {
  private channel?: NetconfChannel;
  private endTransport?: () => void;
  private closed = false;

  constructor(
    private readonly target: DeviceTarget,
    private readonly transport: NetconfTransport,
    private readonly replyTimeoutMs: number
  ) {}

  async connect(): Promise<void> {
    const { host } = this.target;
    const { stream, end } = await this.transport.open(this.target);
    this.endTransport = end;
    this.channel = new NetconfChannel(stream, this.replyTimeoutMs);

    try {
      await this.channel.hello();
    } catch (err) {
      this.channel.end();
      throw new DeviceSessionError("connect", `NETCONF hello with ${host} failed: ${toErrorMessage(err)}`, err);
    }
  }

  async loadConfiguration(config: string): Promise<void> {
    await this.expectSuccess(
      "load",
      `<load-configuration action="set" format="text"><configuration-set>${escapeXml(config)}</configuration-set></load-configuration>`,
      "load-configuration"
    );
  }

  async commit(): Promise<void> {
    await this.expectSuccess("commit", "<commit/>", "commit");
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const { channel, endTransport } = this;
    try {
      if (channel?.isOpen) {
        await channel.rpc("<close-session/>");
      }
    } finally {
      channel?.end();
      endTransport?.();
    }
  }

  private async expectSuccess(category: DeviceSessionErrorCategory, operation: string, label: string): Promise<void> {
    const { host } = this.target;
    if (!this.channel || this.closed) {
      throw new DeviceSessionError(category, `${label} on ${host} attempted without an open session`);
    }

    let reply: RpcReply;
    try {
      reply = await this.channel.rpc(operation);
    } catch (err) {
      throw new DeviceSessionError(category, `${label} on ${host} failed: ${toErrorMessage(err)}`, err);
    }

    if (fatalErrors(reply).length > 0) {
      throw new DeviceSessionError(category, `${label} on ${host} rejected: ${describeErrors(reply)}`);
    }
  }
}
