// LDAP Protocol Implementation
// Minimal BER/LDAP v3 client subset: Bind, Search, Add, Modify, Unbind and their responses
import {
  BaseBlock,
  Boolean as Asn1Boolean,
  Constructed,
  Enumerated,
  fromBER,
  Integer,
  OctetString,
  Primitive,
  Sequence,
  Set as Asn1Set,
} from "asn1js";

// LDAP Message Types (APPLICATION tag numbers)
export enum LDAPMessageType {
  BindRequest = 0,
  BindResponse = 1,
  UnbindRequest = 2,
  SearchRequest = 3,
  SearchResultEntry = 4,
  SearchResultDone = 5,
  ModifyRequest = 6,
  ModifyResponse = 7,
  AddRequest = 8,
  AddResponse = 9,
  SearchResultReference = 19,
  ExtendedResponse = 24,
}

// LDAP Result Codes
export enum LDAPResultCode {
  Success = 0,
  OperationsError = 1,
  ProtocolError = 2,
  TimeLimitExceeded = 3,
  SizeLimitExceeded = 4,
  CompareFalse = 5,
  CompareTrue = 6,
  AuthMethodNotSupported = 7,
  StrongerAuthRequired = 8,
  Referral = 10,
  NoSuchAttribute = 16,
  UndefinedAttributeType = 17,
  ConstraintViolation = 19,
  AttributeOrValueExists = 20,
  InvalidAttributeSyntax = 21,
  NoSuchObject = 32,
  InvalidDNSyntax = 34,
  InvalidCredentials = 49,
  InsufficientAccessRights = 50,
  Busy = 51,
  Unavailable = 52,
  UnwillingToPerform = 53,
  LoopDetect = 54,
  NamingViolation = 64,
  ObjectClassViolation = 65,
  NotAllowedOnNonLeaf = 66,
  NotAllowedOnRdn = 67,
  EntryAlreadyExists = 68,
  ObjectClassModsProhibited = 69,
  AffectsMultipleDsas = 71,
  Other = 80,
}

// LDAP Search Scope
export enum SearchScope {
  BaseObject = 0,
  SingleLevel = 1,
  WholeSubtree = 2,
}

// LDAP Search Deref Aliases
export enum DerefAliases {
  NeverDerefAliases = 0,
  DerefInSearching = 1,
  DerefFindingBaseObj = 2,
  DerefAlways = 3,
}

// LDAP Filter Types (context tag numbers)
export enum FilterType {
  And = 0,
  EqualityMatch = 3,
}

export enum ModifyOperation {
  Add = 0,
  Delete = 1,
  Replace = 2,
}

// Basic LDAP Message Structure
export interface LDAPMessage {
  messageID: number;
  protocolOp: LDAPProtocolOp;
}

export type LDAPRequestOp =
  | BindRequest
  | UnbindRequest
  | SearchRequest
  | AddRequest
  | ModifyRequest;

export type LDAPResponseOp =
  | BindResponse
  | SearchResultEntry
  | SearchResultReference
  | SearchResultDone
  | ModifyResponse
  | AddResponse
  | ExtendedResponse;

export type LDAPProtocolOp = LDAPRequestOp | LDAPResponseOp;

export type AttributeValue = string | Uint8Array;

export interface LDAPResult {
  resultCode: LDAPResultCode;
  matchedDN: string;
  diagnosticMessage: string;
}

export interface BindRequest {
  type: LDAPMessageType.BindRequest;
  version: number;
  name: string; // DN or UPN
  password: string; // simple authentication only
}

export interface BindResponse extends LDAPResult {
  type: LDAPMessageType.BindResponse;
}

export interface UnbindRequest {
  type: LDAPMessageType.UnbindRequest;
}

export interface SearchRequest {
  type: LDAPMessageType.SearchRequest;
  baseObject: string; // DN
  scope: SearchScope;
  derefAliases: DerefAliases;
  sizeLimit: number;
  timeLimit: number;
  typesOnly: boolean;
  filter: Filter;
  attributes: string[];
}

export interface SearchResultEntry {
  type: LDAPMessageType.SearchResultEntry;
  objectName: string; // DN
  attributes: PartialAttribute[];
}

export interface SearchResultReference {
  type: LDAPMessageType.SearchResultReference;
  uris: string[];
}

export interface SearchResultDone extends LDAPResult {
  type: LDAPMessageType.SearchResultDone;
}

export interface AddRequest {
  type: LDAPMessageType.AddRequest;
  entry: string; // DN
  attributes: EncodableAttribute[];
}

export interface AddResponse extends LDAPResult {
  type: LDAPMessageType.AddResponse;
}

export interface ModifyChange {
  operation: ModifyOperation;
  modification: EncodableAttribute;
}

export interface ModifyRequest {
  type: LDAPMessageType.ModifyRequest;
  object: string; // DN
  changes: ModifyChange[];
}

export interface ModifyResponse extends LDAPResult {
  type: LDAPMessageType.ModifyResponse;
}

// Sent with messageID 0 when the server is about to drop the connection
export interface ExtendedResponse extends LDAPResult {
  type: LDAPMessageType.ExtendedResponse;
}

export interface PartialAttribute {
  type: string; // attribute name
  vals: string[]; // attribute values
}

export interface EncodableAttribute {
  type: string;
  vals: AttributeValue[]; // binary values (unicodePwd) are sent as raw octets
}

// Filter definitions
export type Filter = AndFilter | EqualityMatchFilter;

export interface AndFilter {
  type: FilterType.And;
  filters: Filter[];
}

export interface EqualityMatchFilter {
  type: FilterType.EqualityMatch;
  attributeDesc: string;
  assertionValue: string;
}

// BER tag classes as numbered by asn1js
const TAG_CLASS_APPLICATION = 2;
const TAG_CLASS_CONTEXT = 3;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

// ---------- Helpers ----------
function requireBlock(block: BaseBlock | undefined, msg: string): BaseBlock {
  if (!block) throw new Error(msg);
  return block;
}

function asConstructed(block: BaseBlock | undefined, msg: string): Constructed {
  const b = requireBlock(block, msg);
  if (!(b instanceof Constructed)) throw new Error(msg);
  return b;
}

function asInteger(block: BaseBlock | undefined, msg: string): Integer {
  const b = requireBlock(block, msg);
  if (!(b instanceof Integer)) throw new Error(msg);
  return b;
}

function decodeBytes(block: BaseBlock | undefined, msg: string): Uint8Array {
  const b = requireBlock(block, msg);
  if (b instanceof OctetString || b instanceof Primitive) {
    return new Uint8Array(b.valueBlock.valueHexView);
  }
  throw new Error(msg);
}

function decodeString(block: BaseBlock | undefined, msg: string): string {
  return textDecoder.decode(decodeBytes(block, msg));
}

function octet(value: AttributeValue): OctetString {
  return new OctetString({ valueHex: typeof value === "string" ? textEncoder.encode(value) : value });
}

function application(tagNumber: LDAPMessageType, value: BaseBlock[]): Constructed {
  return new Constructed({ idBlock: { tagClass: TAG_CLASS_APPLICATION, tagNumber }, value });
}

function encodeAttribute(attribute: EncodableAttribute): Sequence {
  return new Sequence({
    value: [octet(attribute.type), new Asn1Set({ value: attribute.vals.map(octet) })],
  });
}

function decodeResult(block: Constructed, name: string): LDAPResult {
  const seq = block.valueBlock.value;
  if (seq.length < 3) throw new Error(`${name} must contain resultCode, matchedDN and diagnosticMessage`);
  const resultCode: LDAPResultCode = asInteger(seq[0], `${name} resultCode must be Enumerated`).valueBlock.valueDec;
  return {
    resultCode,
    matchedDN: decodeString(seq[1], `${name} matchedDN must be OctetString`),
    diagnosticMessage: decodeString(seq[2], `${name} diagnosticMessage must be OctetString`),
  };
}

/**
 * Length in bytes of the first complete BER element in `data`, or undefined while the
 * element is still incomplete. Throws when the header itself is malformed.
 */
export function frameLength(data: Uint8Array): number | undefined {
  if (data.length < 2) return undefined;
  const first = data[1];
  if (first < 0x80) {
    const total = 2 + first;
    return data.length >= total ? total : undefined;
  }
  const lengthBytes = first & 0x7f;
  if (lengthBytes === 0 || lengthBytes > 4) {
    throw new Error(`Unsupported BER length form (0x${first.toString(16)})`);
  }
  if (data.length < 2 + lengthBytes) return undefined;
  let length = 0;
  for (let i = 0; i < lengthBytes; i++) {
    length = length * 256 + data[2 + i];
  }
  const total = 2 + lengthBytes + length;
  return data.length >= total ? total : undefined;
}

// ---------- Codec ----------
export class LDAPCodec {
  static encode(message: LDAPMessage): Uint8Array {
    const op = this.encodeProtocolOp(message.protocolOp);
    const messageSeq = new Sequence({ value: [new Integer({ value: message.messageID }), op] });
    return new Uint8Array(messageSeq.toBER(false));
  }

  private static encodeProtocolOp(op: LDAPProtocolOp): BaseBlock {
    switch (op.type) {
      case LDAPMessageType.BindRequest:
        return application(LDAPMessageType.BindRequest, [
          new Integer({ value: op.version }),
          octet(op.name),
          // simple [0] OCTET STRING
          new Primitive({
            idBlock: { tagClass: TAG_CLASS_CONTEXT, tagNumber: 0 },
            valueHex: textEncoder.encode(op.password),
          }),
        ]);

      case LDAPMessageType.UnbindRequest:
        return new Primitive({ idBlock: { tagClass: TAG_CLASS_APPLICATION, tagNumber: LDAPMessageType.UnbindRequest } });

      case LDAPMessageType.SearchRequest:
        return application(LDAPMessageType.SearchRequest, [
          octet(op.baseObject),
          new Enumerated({ value: op.scope }),
          new Enumerated({ value: op.derefAliases }),
          new Integer({ value: op.sizeLimit }),
          new Integer({ value: op.timeLimit }),
          new Asn1Boolean({ value: op.typesOnly }),
          this.encodeFilter(op.filter),
          new Sequence({ value: op.attributes.map(octet) }),
        ]);

      case LDAPMessageType.AddRequest:
        return application(LDAPMessageType.AddRequest, [
          octet(op.entry),
          new Sequence({ value: op.attributes.map(encodeAttribute) }),
        ]);

      case LDAPMessageType.ModifyRequest:
        return application(LDAPMessageType.ModifyRequest, [
          octet(op.object),
          new Sequence({
            value: op.changes.map((change) =>
              new Sequence({
                value: [new Enumerated({ value: change.operation }), encodeAttribute(change.modification)],
              })
            ),
          }),
        ]);

      default:
        throw new Error(`Cannot encode protocolOp type ${LDAPMessageType[op.type]}`);
    }
  }

  static encodeFilter(filter: Filter): BaseBlock {
    switch (filter.type) {
      case FilterType.And:
        return new Constructed({
          idBlock: { tagClass: TAG_CLASS_CONTEXT, tagNumber: FilterType.And },
          value: filter.filters.map((f) => this.encodeFilter(f)),
        });
      case FilterType.EqualityMatch:
        return new Constructed({
          idBlock: { tagClass: TAG_CLASS_CONTEXT, tagNumber: FilterType.EqualityMatch },
          value: [octet(filter.attributeDesc), octet(filter.assertionValue)],
        });
    }
  }

  static decode(data: Uint8Array): LDAPMessage {
    const result = fromBER(data);
    if (result.offset === -1) {
      throw new Error(`Failed to decode BER: ${result.result.error}`);
    }

    const root = asConstructed(result.result, "LDAPMessage must be a sequence");
    const blocks = root.valueBlock.value;
    if (blocks.length < 2) {
      throw new Error("Invalid LDAPMessage structure");
    }

    const messageID = asInteger(blocks[0], "messageID must be Integer").valueBlock.valueDec;
    const opBlock = requireBlock(blocks[1], "Missing protocolOp");
    if (opBlock.idBlock.tagClass !== TAG_CLASS_APPLICATION) {
      throw new Error(`protocolOp must be APPLICATION tagged (tagClass=${opBlock.idBlock.tagClass})`);
    }

    return { messageID, protocolOp: this.decodeResponseOp(opBlock) };
  }

  private static decodeResponseOp(block: BaseBlock): LDAPResponseOp {
    const tagNumber = block.idBlock.tagNumber;
    const result = (name: string) => decodeResult(asConstructed(block, `${name} must be constructed`), name);
    switch (tagNumber) {
      case LDAPMessageType.BindResponse:
        return { type: LDAPMessageType.BindResponse, ...result("BindResponse") };
      case LDAPMessageType.SearchResultDone:
        return { type: LDAPMessageType.SearchResultDone, ...result("SearchResultDone") };
      case LDAPMessageType.ModifyResponse:
        return { type: LDAPMessageType.ModifyResponse, ...result("ModifyResponse") };
      case LDAPMessageType.AddResponse:
        return { type: LDAPMessageType.AddResponse, ...result("AddResponse") };
      case LDAPMessageType.ExtendedResponse:
        return { type: LDAPMessageType.ExtendedResponse, ...result("ExtendedResponse") };

      case LDAPMessageType.SearchResultEntry: {
        const seq = asConstructed(block, "SearchResultEntry must be constructed").valueBlock.value;
        const objectName = decodeString(seq[0], "SearchResultEntry objectName must be OctetString");
        const attributes: PartialAttribute[] = [];
        const attrList = asConstructed(seq[1], "SearchResultEntry attributes must be a sequence").valueBlock.value;
        for (const attr of attrList) {
          const pair = asConstructed(attr, "PartialAttribute must be a sequence").valueBlock.value;
          const type = decodeString(pair[0], "PartialAttribute type must be OctetString");
          const vals = asConstructed(pair[1], "PartialAttribute vals must be a set").valueBlock.value
            .map((v) => decodeString(v, `Value of ${type} must be OctetString`));
          attributes.push({ type, vals });
        }
        return { type: LDAPMessageType.SearchResultEntry, objectName, attributes };
      }

      case LDAPMessageType.SearchResultReference: {
        const seq = asConstructed(block, "SearchResultReference must be constructed").valueBlock.value;
        return {
          type: LDAPMessageType.SearchResultReference,
          uris: seq.map((uri) => decodeString(uri, "Referral URI must be OctetString")),
        };
      }

      default:
        throw new Error(`Unsupported LDAP response type ${tagNumber}`);
    }
  }

  // Decode the first complete message in `data`. Returns null while more bytes are needed.
  static tryDecode(data: Uint8Array): { message: LDAPMessage; consumed: number } | null {
    const consumed = frameLength(data);
    if (consumed === undefined) return null;
    return { message: this.decode(data.subarray(0, consumed)), consumed };
  }

  static formatFilter(filter: Filter): string {
    switch (filter.type) {
      case FilterType.And:
        return `(&${filter.filters.map((f) => this.formatFilter(f)).join("")})`;
      case FilterType.EqualityMatch:
        return `(${filter.attributeDesc}=${escapeFilterValue(filter.assertionValue)})`;
    }
  }
}

/** RFC 4515 string-form escaping for search filters written to the debug log */
export function escapeFilterValue(value: string): string {
  return value.replace(/[\\*()\0]/g, (ch) => `\\${ch.charCodeAt(0).toString(16).padStart(2, "0")}`);
}

export function attributeValues(entry: SearchResultEntry, name: string): string[] {
  const wanted = name.toLowerCase();
  return entry.attributes.find((a) => a.type.toLowerCase() === wanted)?.vals ?? [];
}

// LDAP Constants
export const LDAP_VERSION = 3;
export const LDAP_PORT = 389;
export const LDAPS_PORT = 636;
