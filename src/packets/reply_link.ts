import { PacketInvalidDataError } from "./packet_errors";

export type PacketLike = {
  readonly packetId: string | null;
};

export type ReplyLink =
  | { kind: "unset" }
  | { kind: "by_id"; packetId: string }
  | { kind: "by_packet"; packet: PacketLike };

/** Raw envelope shape, e.g. a packet received off the wire and not yet decoded. */
export type HeaderLike = {
  header: { packet_id: string | number };
};

export type InReplyToInput = ReplyLink | PacketLike | HeaderLike | string | number | null | undefined;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isReplyLink(value: Record<string, unknown>): boolean {
  return value.kind === "unset" || value.kind === "by_id" || value.kind === "by_packet";
}

function invalidReference(message: string): PacketInvalidDataError {
  return new PacketInvalidDataError({
    code: "invalid_reply_reference",
    message,
    field: "in_reply_to",
  });
}

/**
 * Resolves the accepted in_reply_to shapes into a ReplyLink, checked in order:
 * null, string, integer, tagged link, packet, raw envelope. An empty id means
 * no link.
 */
export function toReplyLink(input: unknown): ReplyLink {
  if (input === null || input === undefined) return { kind: "unset" };
  if (typeof input === "string") {
    return input.length > 0 ? { kind: "by_id", packetId: input } : { kind: "unset" };
  }
  if (typeof input === "number") {
    if (!Number.isInteger(input)) {
      throw invalidReference(`in_reply_to must be an integer id, got ${input}`);
    }
    return { kind: "by_id", packetId: String(input) };
  }
  if (!isRecord(input)) {
    throw invalidReference(`in_reply_to cannot reference a ${typeof input}`);
  }

  if (isReplyLink(input)) {
    const { kind, packetId, packet } = input;
    if (kind === "unset") return { kind: "unset" };
    if (kind === "by_id" && typeof packetId === "string") {
      return toReplyLink(packetId);
    }
    if (kind === "by_packet" && isRecord(packet) && "packetId" in packet) {
      return toReplyLink({ packetId: packet.packetId });
    }
    throw invalidReference(`in_reply_to link of kind '${String(kind)}' is incomplete`);
  }

  if ("packetId" in input) {
    const packetId = input.packetId;
    if (packetId === null || packetId === "") return { kind: "unset" };
    if (typeof packetId === "string") return { kind: "by_packet", packet: { packetId } };
    throw invalidReference("in_reply_to packet has a non-text packetId");
  }

  const header = input.header;
  if (isRecord(header)) {
    const packetId = header.packet_id;
    if (typeof packetId === "string" && packetId.length > 0) {
      return { kind: "by_id", packetId };
    }
    if (typeof packetId === "number" && Number.isInteger(packetId)) {
      return { kind: "by_id", packetId: String(packetId) };
    }
  }

  throw invalidReference("in_reply_to must be an id, a packet, or an envelope with header.packet_id");
}

export function replyLinkId(link: ReplyLink): string | null {
  switch (link.kind) {
    case "unset":
      return null;
    case "by_id":
      return link.packetId;
    case "by_packet":
      return link.packet.packetId;
  }
}
