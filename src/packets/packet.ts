import type { FieldValue } from "../contracts/envelope";
import {
  buildFieldAccessors,
  FieldStore,
  toFieldRecord,
  unknownField,
  type AllowedFieldAccessor,
  type FieldAccessors,
  type FieldRecord,
  type RequiredFieldAccessor,
} from "./field_store";
import { PacketInvalidDataError } from "./packet_errors";
import { createPacketSchema, parseDateField, type PacketSchema, type PacketSchemaDefinition } from "./packet_schema";
import { replyLinkId, toReplyLink, type InReplyToInput, type ReplyLink } from "./reply_link";
import { checkPacket, type PacketCheckResult } from "./validator";

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export type PacketInit = {
  packetId?: string | number | null;
  timestamp?: Date | string;
  inReplyTo?: InReplyToInput;
  /** Seed for fields outside the schema. Copied; never shared between packets. */
  extensionFields?: Record<string, FieldValue | null | undefined>;
  fields?: Record<string, FieldValue | null | undefined>;
  clock?: Clock;
};

export type PacketClass<
  T extends string = string,
  R extends string = string,
  A extends string = string,
> = {
  new (init?: PacketInit): Packet<T, R, A>;
  readonly schema: PacketSchema<T, R, A>;
};

export type AnyPacketClass = PacketClass<string, string, string>;

function resolveTimestamp(init: PacketInit): Date {
  if (init.timestamp === undefined) {
    return (init.clock ?? systemClock)();
  }
  const parsed = parseDateField("date", init.timestamp);
  return parsed ?? (init.clock ?? systemClock)();
}

export class Packet<T extends string = string, R extends string = string, A extends string = string> {
  packetId: string | null;
  timestamp: Date;
  readonly schema: PacketSchema<T, R, A>;

  private replyLink: ReplyLink;
  private readonly store: FieldStore;
  private readonly accessors: FieldAccessors<R, A>;

  constructor(schema: PacketSchema<T, R, A>, init: PacketInit = {}) {
    this.schema = schema;
    this.packetId = init.packetId === undefined || init.packetId === null ? null : String(init.packetId);
    this.timestamp = resolveTimestamp(init);
    this.replyLink = toReplyLink(init.inReplyTo);
    this.store = new FieldStore(schema);
    this.accessors = buildFieldAccessors(schema, this.store);

    for (const source of [init.extensionFields, init.fields]) {
      if (!source) continue;
      for (const [name, value] of Object.entries(source)) {
        if (value !== undefined) this.store.set(name, value);
      }
    }
  }

  get packetType(): T {
    return this.schema.type;
  }

  get expectedReplies(): readonly string[] {
    return this.schema.replies;
  }

  get inReplyToId(): string | null {
    return replyLinkId(this.replyLink);
  }

  get inReplyTo(): ReplyLink {
    return this.replyLink;
  }

  set inReplyTo(input: InReplyToInput) {
    this.replyLink = toReplyLink(input);
  }

  get requiredFields(): FieldRecord {
    return toFieldRecord(this.store.required);
  }

  get allowedFields(): FieldRecord {
    return toFieldRecord(this.store.allowed);
  }

  get extensionFields(): FieldRecord {
    return toFieldRecord(this.store.extension);
  }

  requiredField(name: R): RequiredFieldAccessor {
    const accessor = this.accessors.required.get(name);
    if (!accessor) throw unknownField(name, this.packetType);
    return accessor;
  }

  allowedField(name: A): AllowedFieldAccessor {
    const accessor = this.accessors.allowed.get(name);
    if (!accessor) throw unknownField(name, this.packetType);
    return accessor;
  }

  getField(name: string): FieldValue | null {
    return this.store.get(name);
  }

  setField(name: string, value: FieldValue | null): void {
    this.store.set(name, value);
  }

  /** Required fields go back to null; other fields are removed. */
  resetField(name: string): void {
    this.store.reset(name);
  }

  /** Iterates body entries in serialization order: required, allowed, extension. */
  *entries(): IterableIterator<[string, FieldValue | null]> {
    yield* this.store.required;
    yield* this.store.allowed;
    yield* this.store.extension;
  }

  check(): PacketCheckResult {
    return checkPacket(this);
  }

  validate(): true {
    const result = this.check();
    if (!result.ok) throw result.error;
    return true;
  }

  /**
   * Type-specific checks. Runs after the required-field scan, and only for
   * packets that are not replies.
   */
  validateFields(): PacketInvalidDataError | null {
    return null;
  }
}

/**
 * Declares a packet type. Field names are inferred as literal unions, so
 * `requiredField("...")` and `allowedField("...")` are checked by the compiler.
 *
 * @example
 * ```ts
 * const RequestAccountCreate = definePacket({
 *   type: "request_account_create",
 *   required: ["UserFirstName", "UserLastName", "StartDate"],
 *   allowed: ["UserEmail"],
 *   replies: ["notify_account_create"],
 * });
 * const packet = new RequestAccountCreate({ packetId: "1001" });
 * packet.requiredField("UserFirstName").set("Ada");
 * ```
 */
export function definePacket<T extends string, R extends string, A extends string = never>(
  definition: PacketSchemaDefinition<T, R, A>
): PacketClass<T, R, A> {
  const schema = createPacketSchema(definition);

  return class DefinedPacket extends Packet<T, R, A> {
    static readonly schema = schema;

    constructor(init?: PacketInit) {
      super(schema, init);
    }
  };
}
