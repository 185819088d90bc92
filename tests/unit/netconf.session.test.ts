import { DeviceSessionError } from "../../src/core/errors";
import { NetconfChannel } from "../../src/infrastructure/netconf/NetconfChannel";
import { NetconfDeviceSession } from "../../src/infrastructure/netconf/NetconfDeviceSession";
import { SshNetconfSessionFactory, classifySshError } from "../../src/infrastructure/netconf/SshNetconfSessionFactory";
import { createFakeNetconfDevice, createFakeTransport } from "../support/fakeNetconfDevice";

const target = { host: "10.0.0.1", username: "admin", password: "test-password" };

const captureSessionError = async (promise: Promise<unknown>): Promise<DeviceSessionError> => {
  try {
    await promise;
  } catch (err) {
    if (err instanceof DeviceSessionError) return err;
    throw err;
  }
  throw new Error("expected a DeviceSessionError");
};

const loadError = `<load-configuration-results><rpc-error><error-severity>error</error-severity><error-message>syntax error, expecting &lt;command&gt;</error-message></rpc-error></load-configuration-results>`;

describe("NetconfDeviceSession", () => {
  it("loads the configuration as set commands, commits, and closes the session", async () => {
    const device = createFakeNetconfDevice();
    const { transport, endedHosts } = createFakeTransport({ [target.host]: device });
    const session = new NetconfDeviceSession(target, transport, 1000);

    await session.connect();
    await session.loadConfiguration('set system host-name sw1\nset system login message "a & b"');
    await session.commit();
    await session.close();

    expect(device.rpcs).toHaveLength(3);
    expect(device.rpcs[0]).toContain(
      '<rpc message-id="1" xmlns="urn:ietf:params:xml:ns:netconf:base:1.0">' +
        '<load-configuration action="set" format="text"><configuration-set>' +
        'set system host-name sw1\nset system login message "a &amp; b"' +
        "</configuration-set></load-configuration></rpc>"
    );
    expect(device.rpcs[1]).toContain('<rpc message-id="2" xmlns="urn:ietf:params:xml:ns:netconf:base:1.0"><commit/></rpc>');
    expect(device.rpcs[2]).toContain("<close-session/>");
    await new Promise((r) => setImmediate(r));
    expect(device.ended()).toBe(true);
    expect(endedHosts).toEqual([target.host]);
  });

  it("reports a rejected load as a load error", async () => {
    const device = createFakeNetconfDevice({
      reply: (rpc) => (rpc.includes("<load-configuration") ? loadError : "<ok/>")
    });
    const { transport } = createFakeTransport({ [target.host]: device });
    const session = new NetconfDeviceSession(target, transport, 1000);
    await session.connect();

    const error = await captureSessionError(session.loadConfiguration("set bogus"));

    expect(error.category).toBe("load");
    expect(error.message).toBe("load-configuration on 10.0.0.1 rejected: syntax error, expecting <command>");
    await session.close();
  });

  it("reports a rejected commit as a commit error", async () => {
    const device = createFakeNetconfDevice({
      reply: (rpc) =>
        rpc.includes("<commit/>")
          ? "<rpc-error><error-severity>error</error-severity><error-message>commit check failed</error-message></rpc-error>"
          : "<ok/>"
    });
    const { transport } = createFakeTransport({ [target.host]: device });
    const session = new NetconfDeviceSession(target, transport, 1000);
    await session.connect();
    await session.loadConfiguration("set system host-name sw1");

    const error = await captureSessionError(session.commit());

    expect(error.category).toBe("commit");
    expect(error.message).toBe("commit on 10.0.0.1 rejected: commit check failed");
    await session.close();
  });

  it("ignores warning-level rpc-errors", async () => {
    const device = createFakeNetconfDevice({
      reply: () =>
        "<rpc-error><error-severity>warning</error-severity><error-message>statement not found</error-message></rpc-error><ok/>"
    });
    const { transport } = createFakeTransport({ [target.host]: device });
    const session = new NetconfDeviceSession(target, transport, 1000);
    await session.connect();

    await expect(session.loadConfiguration("delete system phone-home")).resolves.toBeUndefined();
    await session.close();
  });

  it("fails the hello when the device lacks base:1.0 and still releases the transport", async () => {
    const device = createFakeNetconfDevice({ capabilities: ["urn:ietf:params:netconf:base:1.1"] });
    const { transport, endedHosts } = createFakeTransport({ [target.host]: device });
    const session = new NetconfDeviceSession(target, transport, 1000);

    const error = await captureSessionError(session.connect());
    await session.close();

    expect(error.category).toBe("connect");
    expect(error.message).toBe(
      "NETCONF hello with 10.0.0.1 failed: NETCONF peer does not advertise urn:ietf:params:netconf:base:1.0"
    );
    expect(device.rpcs).toEqual([]);
    expect(endedHosts).toEqual([target.host]);
  });

  it("times out an unanswered rpc and skips close-session on the poisoned channel", async () => {
    const device = createFakeNetconfDevice({ reply: () => null });
    const { transport, endedHosts } = createFakeTransport({ [target.host]: device });
    const session = new NetconfDeviceSession(target, transport, 30);
    await session.connect();

    const error = await captureSessionError(session.commit());
    await session.close();

    expect(error.category).toBe("commit");
    expect(error.message).toBe("commit on 10.0.0.1 failed: NETCONF reply timeout after 30ms");
    expect(device.rpcs).toHaveLength(1);
    expect(endedHosts).toEqual([target.host]);
  });

  it("fails pending rpcs when the device hangs up", async () => {
    const device = createFakeNetconfDevice({ reply: () => null });
    const { transport } = createFakeTransport({ [target.host]: device });
    const session = new NetconfDeviceSession(target, transport, 1000);
    await session.connect();

    const pending = captureSessionError(session.loadConfiguration("set system host-name sw1"));
    device.hangUp();
    const error = await pending;

    expect(error.category).toBe("load");
    expect(error.message).toBe("load-configuration on 10.0.0.1 failed: NETCONF channel ended by peer");
    await session.close();
  });

  it("closes only once", async () => {
    const device = createFakeNetconfDevice();
    const { transport, endedHosts } = createFakeTransport({ [target.host]: device });
    const session = new NetconfDeviceSession(target, transport, 1000);
    await session.connect();

    await session.close();
    await session.close();

    expect(device.rpcs).toHaveLength(1);
    expect(endedHosts).toEqual([target.host]);
  });

  it("refuses to load before connecting", async () => {
    const { transport } = createFakeTransport({});
    const session = new NetconfDeviceSession(target, transport, 1000);

    const error = await captureSessionError(session.loadConfiguration("set system host-name sw1"));
    expect(error.message).toBe("load-configuration on 10.0.0.1 attempted without an open session");
  });
});

describe("NetconfChannel", () => {
  it("matches concurrent replies to requests in order", async () => {
    const device = createFakeNetconfDevice();
    const channel = new NetconfChannel(device.stream, 1000);

    await expect(channel.hello()).resolves.toContain("urn:ietf:params:netconf:base:1.0");
    const replies = await Promise.all([channel.rpc("<get-config/>"), channel.rpc("<commit/>")]);

    expect(replies).toEqual([
      { ok: true, errors: [] },
      { ok: true, errors: [] }
    ]);
    channel.end();
    expect(channel.isOpen).toBe(false);
  });
});

describe("SshNetconfSessionFactory", () => {
  it("creates sessions on the configured transport", async () => {
    const device = createFakeNetconfDevice();
    const { transport, endedHosts } = createFakeTransport({ [target.host]: device });
    const factory = new SshNetconfSessionFactory({ port: 830, timeoutMs: 1000 }, transport);

    const session = factory.create(target);
    await session.connect();
    await session.close();

    expect(endedHosts).toEqual([target.host]);
  });
});

describe("classifySshError", () => {
  it("maps ssh2 authentication failures to auth errors", () => {
    const err = Object.assign(new Error("All configured authentication methods failed"), {
      level: "client-authentication"
    });
    const classified = classifySshError(err, "10.0.0.1");
    expect(classified.category).toBe("auth");
    expect(classified.message).toBe("Authentication failed on 10.0.0.1: All configured authentication methods failed");
  });

  it("maps handshake timeouts and socket errors to connect errors", () => {
    const timeout = Object.assign(new Error("Timed out while waiting for handshake"), { level: "client-timeout" });
    const refused = Object.assign(new Error("connect ECONNREFUSED 10.0.0.1:830"), { level: "client-socket" });

    expect(classifySshError(timeout, "10.0.0.1").category).toBe("connect");
    expect(classifySshError(refused, "10.0.0.1").message).toBe(
      "Unable to establish NETCONF session with 10.0.0.1: connect ECONNREFUSED 10.0.0.1:830"
    );
  });
});
