import { Constructed, Enumerated, fromBER, Integer, OctetString, Sequence, Set as Asn1Set } from "asn1js";
import { createServer, type Server, type Socket } from "node:net";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LdapDirectoryAdaptor } from "../src/adaptors/ldap_adaptor.ts";
import { isLabError } from "../src/models/errors.ts";
import { FilterType, frameLength, LDAPMessageType, LDAPResultCode } from "../src/protocol/ldap.ts";
import { LDAPClient } from "../src/services/ldap_client.ts";

const APPLICATION = 2;

function octet(value: string): OctetString {
  return new OctetString({ valueHex: new TextEncoder().encode(value) });
}

function envelope(messageID: number, op: Constructed): Uint8Array {
  return new Uint8Array(new Sequence({ value: [new Integer({ value: messageID }), op] }).toBER(false));
}

function resultMessage(messageID: number, tagNumber: number, code: number, diagnostic = ""): Uint8Array {
  return envelope(
    messageID,
    new Constructed({
      idBlock: { tagClass: APPLICATION, tagNumber },
      value: [new Enumerated({ value: code }), octet(""), octet(diagnostic)],
    }),
  );
}

function entryMessage(messageID: number, dn: string): Uint8Array {
  return envelope(
    messageID,
    new Constructed({
      idBlock: { tagClass: APPLICATION, tagNumber: LDAPMessageType.SearchResultEntry },
      value: [
        octet(dn),
        new Sequence({
          value: [new Sequence({ value: [octet("sAMAccountName"), new Asn1Set({ value: [octet("Sales")] })] })],
        }),
      ],
    }),
  );
}

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
  const joined = new Uint8Array(a.length + b.length);
  joined.set(a, 0);
  joined.set(b, a.length);
  return joined;
}

// Answers each request by operation type, the way a directory server would
function respond(socket: Socket, request: Uint8Array): void {
  const parsed = fromBER(request);
  if (!(parsed.result instanceof Sequence)) throw new Error("request must be a sequence");
  const [id, op] = parsed.result.valueBlock.value;
  if (!(id instanceof Integer)) throw new Error("messageID must be an integer");
  const messageID = id.valueBlock.valueDec;

  switch (op.idBlock.tagNumber) {
    case LDAPMessageType.BindRequest:
      socket.write(resultMessage(messageID, LDAPMessageType.BindResponse, LDAPResultCode.Success));
      return;
    case LDAPMessageType.SearchRequest: {
      // Split the reply mid-entry so the client has to reassemble it
      const reply = concat(
        entryMessage(messageID, "CN=Sales,CN=Users,DC=corp"),
        resultMessage(messageID, LDAPMessageType.SearchResultDone, LDAPResultCode.Success),
      );
      socket.write(reply.subarray(0, 7));
      setTimeout(() => socket.write(reply.subarray(7)), 10);
      return;
    }
    case LDAPMessageType.AddRequest:
      socket.write(resultMessage(messageID, LDAPMessageType.AddResponse, LDAPResultCode.EntryAlreadyExists, "exists"));
      return;
    case LDAPMessageType.ModifyRequest:
      socket.write(resultMessage(0, LDAPMessageType.ExtendedResponse, LDAPResultCode.Unavailable, "shutting down"));
      return;
    default:
      return;
  }
}

describe("LDAPClient", () => {
  let server: Server;
  let port: number;
  const sockets = new Set<Socket>();

  beforeEach(async () => {
    server = createServer((socket) => {
      sockets.add(socket);
      let buffer = new Uint8Array(0);
      socket.on("data", (chunk: Buffer) => {
        buffer = concat(buffer, chunk);
        let length = frameLength(buffer);
        while (length !== undefined) {
          respond(socket, buffer.slice(0, length));
          buffer = buffer.slice(length);
          length = frameLength(buffer);
        }
      });
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server has no TCP address");
    port = address.port;
  });

  afterEach(async () => {
    for (const socket of sockets) socket.destroy();
    sockets.clear();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it("correlates responses with requests over one connection", async () => {
    const client = new LDAPClient({ url: `ldap://127.0.0.1:${port}`, timeoutMs: 2000 });
    await client.connect();

    expect(await client.bind("CN=admin,DC=corp", "test-secret")).toEqual({
      resultCode: LDAPResultCode.Success,
      matchedDN: "",
      diagnosticMessage: "",
      entries: [],
    });

    const search = await client.search({
      baseObject: "DC=corp",
      filter: { type: FilterType.EqualityMatch, attributeDesc: "objectClass", assertionValue: "group" },
    });
    expect(search.resultCode).toBe(LDAPResultCode.Success);
    expect(search.entries).toEqual([{
      type: LDAPMessageType.SearchResultEntry,
      objectName: "CN=Sales,CN=Users,DC=corp",
      attributes: [{ type: "sAMAccountName", vals: ["Sales"] }],
    }]);

    const added = await client.add("CN=Sales,CN=Users,DC=corp", [{ type: "cn", vals: ["Sales"] }]);
    expect(added.resultCode).toBe(LDAPResultCode.EntryAlreadyExists);
    expect(added.diagnosticMessage).toBe("exists");

    await client.unbind();
  });

  it("fails outstanding requests on a notice of disconnection", async () => {
    const client = new LDAPClient({ url: `ldap://127.0.0.1:${port}`, timeoutMs: 2000 });
    await client.connect();

    await expect(client.modify("CN=Sales,DC=corp", [])).rejects.toThrow("Server closed the session: shutting down");
    await client.unbind();
  });

  it("refuses to send before connecting", async () => {
    const client = new LDAPClient({ url: `ldap://127.0.0.1:${port}` });
    await expect(client.bind("CN=admin,DC=corp", "test-secret")).rejects.toThrow("LDAP client is not connected");
  });

  it("only accepts ldap and ldaps URLs", () => {
    expect(() => new LDAPClient({ url: "http://127.0.0.1" })).toThrow("Unsupported LDAP URL scheme: http:");
    expect(new LDAPClient({ url: "ldaps://dc01.corp.example.com" }).secure).toBe(true);
  });
});

describe("LdapDirectoryAdaptor.connect", () => {
  let server: Server;
  let port: number;
  let serverSocketClosed: Promise<void>;

  beforeEach(async () => {
    let markClosed: () => void = () => {};
    serverSocketClosed = new Promise<void>((resolve) => {
      markClosed = resolve;
    });
    // Accepts the connection and never answers
    server = createServer((socket) => {
      socket.on("error", () => {});
      socket.on("close", () => markClosed());
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server has no TCP address");
    port = address.port;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it("reports a bind that times out as DirectoryUnavailable and drops the connection", async () => {
    const error = await LdapDirectoryAdaptor.connect(
      {
        url: `ldap://127.0.0.1:${port}`,
        bindDN: "CN=admin,DC=corp",
        bindPassword: "test-secret",
        timeoutMs: 200,
      },
      "corp.example.com",
    ).then(() => undefined, (e: unknown) => e);

    expect(isLabError(error, "DirectoryUnavailable")).toBe(true);
    if (isLabError(error)) {
      expect(error.message).toBe("Bind as CN=admin,DC=corp failed");
      expect(error.cause).toBeInstanceOf(Error);
    }
    await serverSocketClosed;
  });
});
