import { XMLParser } from "fast-xml-parser";

export type RpcError = {
  severity: string;
  message: string;
  tag?: string;
};

export type RpcReply = {
  ok: boolean;
  errors: RpcError[];
};

const parser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const textOf = (value: unknown): string => {
  if (typeof value === "string") return value.trim();
  if (isRecord(value) && typeof value["#text"] === "string") return value["#text"].trim();
  return "";
};

const toList = (value: unknown): unknown[] => (Array.isArray(value) ? value : [value]);

const walk = (node: unknown, visit: (key: string, value: unknown) => void): void => {
  if (Array.isArray(node)) {
    for (const item of node) walk(item, visit);
    return;
  }
  if (!isRecord(node)) return;
  for (const [key, value] of Object.entries(node)) {
    visit(key, value);
    walk(value, visit);
  }
};

export const parseXml = (message: string): Record<string, unknown> => {
  const parsed: unknown = parser.parse(message);
  if (!isRecord(parsed)) {
    throw new Error("NETCONF message is not an XML document");
  }
  return parsed;
};

/**
 * Reads an `<rpc-reply>`; `<rpc-error>` elements may sit at any depth
 * (Junos nests them in `<load-configuration-results>`).
 */
export const parseRpcReply = (message: string): RpcReply => {
  const doc = parseXml(message);
  if (!("rpc-reply" in doc)) {
    throw new Error("NETCONF message is not an rpc-reply");
  }

  const errors: RpcError[] = [];
  let ok = false;
  walk(doc["rpc-reply"], (key, value) => {
    if (key === "ok") ok = true;
    if (key !== "rpc-error") return;
    for (const entry of toList(value)) {
      if (!isRecord(entry)) continue;
      const tag = textOf(entry["error-tag"]);
      errors.push({
        severity: textOf(entry["error-severity"]) || "error",
        message: textOf(entry["error-message"]) || tag || "unspecified rpc-error",
        ...(tag ? { tag } : {})
      });
    }
  });

  return { ok, errors };
};

export const fatalErrors = (reply: RpcReply): RpcError[] => reply.errors.filter((e) => e.severity !== "warning");

export const parseHelloCapabilities = (message: string): string[] => {
  const doc = parseXml(message);
  const hello = doc.hello;
  if (!isRecord(hello)) {
    throw new Error("NETCONF peer did not send a hello");
  }
  const capabilities = isRecord(hello.capabilities) ? hello.capabilities.capability : undefined;
  if (capabilities === undefined) return [];
  return toList(capabilities).map(textOf).filter((c) => c.length > 0);
};

export const escapeXml = (text: string): string =>
  text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
