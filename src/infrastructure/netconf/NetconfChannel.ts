import type { Duplex } from "stream";
import { parseHelloCapabilities, parseRpcReply, type RpcReply } from "./rpcReply";

export const MESSAGE_DELIMITER = "]]>]]>";
export const NETCONF_BASE_NS = "urn:ietf:params:xml:ns:netconf:base:1.0";
export const BASE_1_0_CAPABILITY = "urn:ietf:params:netconf:base:1.0";

const CLIENT_HELLO =
  `<?xml version="1.0" encoding="UTF-8"?>` +
  `<hello xmlns="${NETCONF_BASE_NS}"><capabilities><capability>${BASE_1_0_CAPABILITY}</capability></capabilities></hello>`;

type Waiter = {
  resolve: (message: string) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
};

/**
 * NETCONF 1.0 message exchange over a byte stream (`]]>]]>` framing).
 * Replies are matched to requests in order; a reply timeout or a stream
 * failure poisons the channel and rejects every pending request.
 */
export class NetconfChannel {
  private buffer = "";
  private readonly inbox: string[] = [];
  private readonly waiters: Waiter[] = [];
  private nextMessageId = 1;
  private failure?: Error;

  constructor(
    private readonly stream: Duplex,
    private readonly replyTimeoutMs: number
  ) {
    stream.setEncoding("utf8");
    stream.on("data", (chunk: string | Buffer) => this.onData(String(chunk)));
    stream.on("error", (err: Error) => this.fail(err));
    stream.on("end", () => this.fail(new Error("NETCONF channel ended by peer")));
    stream.on("close", () => this.fail(new Error("NETCONF channel closed")));
  }

  get isOpen(): boolean {
    return this.failure === undefined;
  }

  /** Exchanges hellos; resolves with the peer's capabilities. */
  async hello(): Promise<string[]> {
    if (this.failure) throw this.failure;
    const reply = this.nextMessage();
    this.send(CLIENT_HELLO);
    const capabilities = parseHelloCapabilities(await reply);
    if (!capabilities.includes(BASE_1_0_CAPABILITY)) {
      throw new Error(`NETCONF peer does not advertise ${BASE_1_0_CAPABILITY}`);
    }
    return capabilities;
  }

  async rpc(operation: string): Promise<RpcReply> {
    if (this.failure) throw this.failure;
    const messageId = this.nextMessageId;
    this.nextMessageId += 1;

    const reply = this.nextMessage();
    this.send(
      `<?xml version="1.0" encoding="UTF-8"?>` +
        `<rpc message-id="${messageId}" xmlns="${NETCONF_BASE_NS}">${operation}</rpc>`
    );
    return parseRpcReply(await reply);
  }

  end(): void {
    if (this.failure === undefined) {
      this.fail(new Error("NETCONF channel closed"));
    }
    if (!this.stream.writableEnded) this.stream.end();
  }

  private send(message: string): void {
    if (this.failure) throw this.failure;
    this.stream.write(`${message}${MESSAGE_DELIMITER}`);
  }

  private onData(chunk: string): void {
    this.buffer += chunk;
    let index = this.buffer.indexOf(MESSAGE_DELIMITER);
    while (index !== -1) {
      const message = this.buffer.slice(0, index).trim();
      this.buffer = this.buffer.slice(index + MESSAGE_DELIMITER.length);
      const waiter = this.waiters.shift();
      if (waiter) {
        clearTimeout(waiter.timer);
        waiter.resolve(message);
      } else {
        this.inbox.push(message);
      }
      index = this.buffer.indexOf(MESSAGE_DELIMITER);
    }
  }

  private nextMessage(): Promise<string> {
    const queued = this.inbox.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.failure) return Promise.reject(this.failure);

    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.fail(new Error(`NETCONF reply timeout after ${this.replyTimeoutMs}ms`));
      }, this.replyTimeoutMs);
      this.waiters.push({ resolve, reject, timer });
    });
  }

  private fail(err: Error): void {
    if (this.failure) return;
    this.failure = err;
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(err);
    }
  }
}
