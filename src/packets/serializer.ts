import {
  PACKET_DATA_TYPE,
  PacketEnvelopeInputSchema,
  type JsonValue,
  type PacketEnvelope,
  type PacketHeader,
} from "../contracts/envelope";
import type { Packet } from "./packet";
import { PacketInvalidDataError, type PacketError, isPacketError } from "./packet_errors";
import type { PacketRegistry } from "./packet_registry";

export type DecodeResult =
  | { ok: true; packet: Packet }
  | { ok: false; error: PacketError };

export function toDict(packet: Packet): PacketEnvelope {
  const entries: [string, JsonValue][] = [];
  for (const [name, value] of packet.entries()) {
    if (value instanceof Date) {
      entries.push([name, value.toISOString()]);
    } else if (value !== null && value !== undefined) {
      entries.push([name, value]);
    }
  }
  // fromEntries defines keys, so a field named "__proto__" stays a field
  const body: Record<string, JsonValue> = Object.fromEntries(entries);

  const header: PacketHeader = {
    packet_id: packet.packetId,
    date: packet.timestamp.toISOString(),
    type: packet.packetType,
    expected_reply_list: [...packet.expectedReplies],
  };
  const inReplyToId = packet.inReplyToId;
  if (inReplyToId !== null) {
    header.in_reply_to = inReplyToId;
  }

  return {
    DATA_TYPE: PACKET_DATA_TYPE,
    header,
    body,
  };
}

export function toJson(packet: Packet): string {
  return JSON.stringify(toDict(packet));
}

export function fromDict(registry: PacketRegistry, data: unknown): Packet {
  const parsed = PacketEnvelopeInputSchema.safeParse(data);
  if (!parsed.success) {
    throw new PacketInvalidDataError({
      code: "malformed_envelope",
      message: "Packet envelope does not match the wire format",
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    });
  }

  const envelope = parsed.data;
  if (registry.options.strictEnvelope && envelope.DATA_TYPE !== PACKET_DATA_TYPE) {
    throw new PacketInvalidDataError({
      code: "malformed_envelope",
      message: `Envelope DATA_TYPE must be "${PACKET_DATA_TYPE}"`,
      field: "DATA_TYPE",
    });
  }

  // The schema guarantees at least one of these is present.
  const packetType = envelope.header.type ?? envelope.type ?? "";
  const PacketType = registry.lookup(packetType);

  return new PacketType({
    packetId: envelope.header.packet_id ?? null,
    timestamp: envelope.header.date,
    inReplyTo: envelope.header.in_reply_to ?? null,
    fields: envelope.body,
    clock: registry.options.clock,
  });
}

export function fromJson(registry: PacketRegistry, text: string): Packet {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new PacketInvalidDataError({
      code: "malformed_json",
      message: `Packet JSON could not be parsed: ${err instanceof Error ? err.message : String(err)}`,
    });
  }
  return fromDict(registry, data);
}

function settle(registry: PacketRegistry, decode: () => Packet): DecodeResult {
  try {
    return { ok: true, packet: decode() };
  } catch (err) {
    if (!isPacketError(err)) throw err;
    registry.options.log.warn(
      { code: err.code, details: err.details },
      "packet.decode: rejected envelope"
    );
    return { ok: false, error: err };
  }
}

export function safeFromDict(registry: PacketRegistry, data: unknown): DecodeResult {
  return settle(registry, () => fromDict(registry, data));
}

export function safeFromJson(registry: PacketRegistry, text: string): DecodeResult {
  return settle(registry, () => fromJson(registry, text));
}
