import type { AnyPacketClass, Clock, Packet } from "./packet";
import { PacketInvalidTypeError } from "./packet_errors";
import type { PacketRegistry } from "./packet_registry";

export type ReplyOptions = {
  /** Id for the reply; may stay null and be assigned before sending. */
  packetId?: string | number | null;
  packetType?: string;
  /** Skip the expected-reply checks. Only honoured together with packetType. */
  force?: boolean;
  clock?: Clock;
};

export function resolveReplyType(
  registry: PacketRegistry,
  source: Packet,
  options: Pick<ReplyOptions, "packetType" | "force"> = {}
): AnyPacketClass {
  const { packetType, force } = options;
  const expected = source.expectedReplies;

  if (packetType !== undefined && force) {
    return registry.lookup(packetType);
  }

  if (expected.length === 0) {
    throw new PacketInvalidTypeError({
      code: "no_reply_expected",
      message: `Packet type '${source.packetType}' does not expect a reply`,
      packetType: source.packetType,
      requestedType: packetType,
      expectedReplies: [],
    });
  }

  if (expected.length > 1 && packetType === undefined) {
    throw new PacketInvalidTypeError({
      code: "ambiguous_reply",
      message: `Packet type '${source.packetType}' has more than one expected response. Specify a packet type for the reply`,
      packetType: source.packetType,
      expectedReplies: [...expected],
    });
  }

  if (packetType !== undefined && !expected.includes(packetType)) {
    throw new PacketInvalidTypeError({
      code: "unexpected_reply",
      message: `'${packetType}' is not an expected reply for packet type '${source.packetType}'`,
      packetType: source.packetType,
      requestedType: packetType,
      expectedReplies: [...expected],
    });
  }

  return registry.lookup(packetType ?? expected[0]);
}

export function replyPacket(registry: PacketRegistry, source: Packet, options: ReplyOptions = {}): Packet {
  const ReplyType = resolveReplyType(registry, source, options);
  const reply = new ReplyType({
    packetId: options.packetId ?? null,
    inReplyTo: source.packetId,
    clock: options.clock ?? registry.options.clock,
  });

  registry.options.log.debug(
    { source: source.packetType, reply: reply.packetType, inReplyTo: reply.inReplyToId },
    "packet.reply: created"
  );
  return reply;
}
