// LDAP Client Implementation
// Single TCP/TLS connection; requests are correlated with responses by message id

import { connect as connectTcp, type Socket } from "node:net";
import { connect as connectTls } from "node:tls";
import {
  type AddRequest,
  DerefAliases,
  type EncodableAttribute,
  type Filter,
  LDAP_PORT,
  LDAP_VERSION,
  LDAPCodec,
  type LDAPMessage,
  LDAPMessageType,
  type LDAPRequestOp,
  type LDAPResult,
  LDAPResultCode,
  LDAPS_PORT,
  type ModifyChange,
  type SearchResultEntry,
  SearchScope,
} from "../protocol/ldap.ts";
import type { ContextLogger } from "./logger.ts";

export interface SearchOptions {
  baseObject: string;
  scope?: SearchScope;
  filter: Filter;
  attributes?: string[];
  sizeLimit?: number;
}

export interface SearchOutcome extends LDAPResult {
  entries: SearchResultEntry[];
}

/** The operations the LDAP directory adaptor needs from a connection */
export interface LDAPSession {
  bind(name: string, password: string): Promise<LDAPResult>;
  search(options: SearchOptions): Promise<SearchOutcome>;
  add(entry: string, attributes: EncodableAttribute[]): Promise<LDAPResult>;
  modify(object: string, changes: ModifyChange[]): Promise<LDAPResult>;
  unbind(): Promise<void>;
}

export interface LDAPClientOptions {
  url: string; // ldap://host[:port] or ldaps://host[:port]
  rejectUnauthorized?: boolean; // TLS certificate verification (default true)
  timeoutMs?: number; // connect and per-operation timeout (default 30000)
  logger?: ContextLogger;
}

interface PendingOperation {
  entries: SearchResultEntry[];
  resolve: (outcome: SearchOutcome) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export class LDAPClient implements LDAPSession {
  private readonly url: URL;
  private readonly rejectUnauthorized: boolean;
  private readonly timeoutMs: number;
  private readonly logger?: ContextLogger;
  private socket?: Socket;
  private buffer = new Uint8Array(0);
  private nextMessageID = 1;
  private readonly pending = new Map<number, PendingOperation>();

  constructor(options: LDAPClientOptions) {
    this.url = new URL(options.url);
    if (this.url.protocol !== "ldap:" && this.url.protocol !== "ldaps:") {
      throw new Error(`Unsupported LDAP URL scheme: ${this.url.protocol}`);
    }
    this.rejectUnauthorized = options.rejectUnauthorized ?? true;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.logger = options.logger;
  }

  get secure(): boolean {
    return this.url.protocol === "ldaps:";
  }

  connect(): Promise<void> {
    const host = this.url.hostname;
    const port = this.url.port ? parseInt(this.url.port) : (this.secure ? LDAPS_PORT : LDAP_PORT);

    return new Promise((resolve, reject) => {
      const socket: Socket = this.secure
        ? connectTls({ host, port, servername: host, rejectUnauthorized: this.rejectUnauthorized })
        : connectTcp({ host, port });
      const readyEvent = this.secure ? "secureConnect" : "connect";

      const timer = setTimeout(() => {
        socket.destroy(new Error(`Timed out connecting to ${host}:${port}`));
      }, this.timeoutMs);

      const onError = (error: Error) => {
        clearTimeout(timer);
        reject(error);
      };

      socket.once("error", onError);
      socket.once(readyEvent, () => {
        clearTimeout(timer);
        socket.off("error", onError);
        this.attach(socket);
        this.logger?.debug("LDAP connection established", { host, port, secure: this.secure });
        resolve();
      });
    });
  }

  async bind(name: string, password: string): Promise<LDAPResult> {
    return await this.request({ type: LDAPMessageType.BindRequest, version: LDAP_VERSION, name, password });
  }

  async search(options: SearchOptions): Promise<SearchOutcome> {
    return await this.request({
      type: LDAPMessageType.SearchRequest,
      baseObject: options.baseObject,
      scope: options.scope ?? SearchScope.WholeSubtree,
      derefAliases: DerefAliases.NeverDerefAliases,
      sizeLimit: options.sizeLimit ?? 0,
      timeLimit: 0,
      typesOnly: false,
      filter: options.filter,
      attributes: options.attributes ?? [],
    });
  }

  async add(entry: string, attributes: EncodableAttribute[]): Promise<LDAPResult> {
    const op: AddRequest = { type: LDAPMessageType.AddRequest, entry, attributes };
    return await this.request(op);
  }

  async modify(object: string, changes: ModifyChange[]): Promise<LDAPResult> {
    return await this.request({ type: LDAPMessageType.ModifyRequest, object, changes });
  }

  async unbind(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;

    const data = LDAPCodec.encode({
      messageID: this.nextMessageID++,
      protocolOp: { type: LDAPMessageType.UnbindRequest },
    });
    // The server sends no response to an unbind; close once the request is flushed
    await new Promise<void>((resolve) => {
      socket.end(data, () => resolve());
    });
    this.socket = undefined;
  }

  /** Drop the connection without an unbind, e.g. when the server stopped answering */
  destroy(): void {
    this.socket?.destroy();
    this.socket = undefined;
  }

  private request(op: LDAPRequestOp): Promise<SearchOutcome> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new Error("LDAP client is not connected"));
    }

    const messageID = this.nextMessageID++;
    const message: LDAPMessage = { messageID, protocolOp: op };

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(messageID);
        reject(new Error(`LDAP ${LDAPMessageType[op.type]} timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);

      this.pending.set(messageID, { entries: [], resolve, reject, timer });
      socket.write(LDAPCodec.encode(message));
    });
  }

  private attach(socket: Socket): void {
    this.socket = socket;
    socket.on("data", (chunk: Buffer) => this.onData(chunk));
    socket.on("error", (error: Error) => this.failAll(error));
    socket.on("close", () => {
      this.socket = undefined;
      this.failAll(new Error("LDAP connection closed"));
    });
  }

  private onData(chunk: Buffer): void {
    // Append incoming bytes to buffer
    const newBuf = new Uint8Array(this.buffer.length + chunk.length);
    newBuf.set(this.buffer, 0);
    newBuf.set(chunk, this.buffer.length);
    this.buffer = newBuf;

    try {
      // Decode as many complete messages as are available
      let decoded = LDAPCodec.tryDecode(this.buffer);
      while (decoded) {
        this.buffer = this.buffer.slice(decoded.consumed);
        this.dispatch(decoded.message);
        decoded = LDAPCodec.tryDecode(this.buffer);
      }
    } catch (error) {
      const dump = Array.from(this.buffer.slice(0, 64)).map((b) => b.toString(16).padStart(2, "0")).join(" ");
      this.logger?.error("Failed to decode LDAP response", error, { head: dump });
      this.socket?.destroy(error instanceof Error ? error : new Error(String(error)));
    }
  }

  private dispatch(message: LDAPMessage): void {
    const op = message.protocolOp;

    // Notice of disconnection arrives unsolicited with messageID 0
    if (message.messageID === 0 && op.type === LDAPMessageType.ExtendedResponse) {
      this.failAll(new Error(`Server closed the session: ${op.diagnosticMessage || LDAPResultCode[op.resultCode]}`));
      return;
    }

    const pending = this.pending.get(message.messageID);
    if (!pending) {
      this.logger?.warn("Dropping LDAP response for unknown message id", { messageID: message.messageID });
      return;
    }

    switch (op.type) {
      case LDAPMessageType.SearchResultEntry:
        pending.entries.push(op);
        return;
      case LDAPMessageType.SearchResultReference:
        // Referrals to other partitions are out of scope for a single-domain lab
        return;
      case LDAPMessageType.BindResponse:
      case LDAPMessageType.SearchResultDone:
      case LDAPMessageType.AddResponse:
      case LDAPMessageType.ModifyResponse:
      case LDAPMessageType.ExtendedResponse:
        clearTimeout(pending.timer);
        this.pending.delete(message.messageID);
        pending.resolve({
          resultCode: op.resultCode,
          matchedDN: op.matchedDN,
          diagnosticMessage: op.diagnosticMessage,
          entries: pending.entries,
        });
        return;
      default:
        this.logger?.warn("Unexpected LDAP message from server", { type: LDAPMessageType[op.type] });
    }
  }

  private failAll(error: Error): void {
    for (const [messageID, pending] of this.pending) {
      clearTimeout(pending.timer);
      this.pending.delete(messageID);
      pending.reject(error);
    }
  }
}

export default LDAPClient;
