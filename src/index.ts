export {
  PACKET_DATA_TYPE,
  JsonValueSchema,
  PacketEnvelopeInputSchema,
} from "./contracts/envelope";
export type {
  FieldValue,
  JsonValue,
  PacketEnvelope,
  PacketEnvelopeInput,
  PacketHeader,
} from "./contracts/envelope";

export { loadPacketConfig } from "./config/packet_config";
export type { LogLevel, PacketConfig } from "./config/packet_config";
export { createPacketLogger } from "./logging/logger";
export type { PacketLogger } from "./logging/logger";

export { buildFieldAccessors, FieldStore } from "./packets/field_store";
export type {
  AllowedFieldAccessor,
  FieldAccessors,
  FieldRecord,
  RequiredFieldAccessor,
} from "./packets/field_store";
export { definePacket, Packet, systemClock } from "./packets/packet";
export type { AnyPacketClass, Clock, PacketClass, PacketInit } from "./packets/packet";
export {
  isPacketError,
  PacketInvalidDataError,
  PacketInvalidTypeError,
} from "./packets/packet_errors";
export type {
  PacketError,
  PacketInvalidDataCode,
  PacketInvalidDataDetails,
  PacketInvalidTypeCode,
  PacketInvalidTypeDetails,
} from "./packets/packet_errors";
export {
  assertRegistryComplete,
  createPacketRegistry,
  PacketRegistry,
} from "./packets/packet_registry";
export type { PacketRegistryOptions } from "./packets/packet_registry";
export {
  createPacketSchema,
  DATE_FIELD_MARKER,
  isDateFieldName,
  parseDateField,
} from "./packets/packet_schema";
export type { PacketSchema, PacketSchemaDefinition } from "./packets/packet_schema";
export { replyLinkId, toReplyLink } from "./packets/reply_link";
export type { HeaderLike, InReplyToInput, PacketLike, ReplyLink } from "./packets/reply_link";
export { replyPacket, resolveReplyType } from "./packets/reply_resolver";
export type { ReplyOptions } from "./packets/reply_resolver";
export {
  fromDict,
  fromJson,
  safeFromDict,
  safeFromJson,
  toDict,
  toJson,
} from "./packets/serializer";
export type { DecodeResult } from "./packets/serializer";
export { checkPacket, validatePacket } from "./packets/validator";
export type { PacketCheckResult } from "./packets/validator";
