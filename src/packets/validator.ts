import { PacketInvalidDataError } from "./packet_errors";
import type { Packet } from "./packet";

export type PacketCheckResult =
  | { ok: true }
  | { ok: false; error: PacketInvalidDataError };

/**
 * Required-field presence check.
 *
 * Replies pass unconditionally: the recipient back-fills their missing
 * required fields from the packet they reference.
 */
export function checkPacket(packet: Packet): PacketCheckResult {
  if (packet.inReplyToId !== null) {
    return { ok: true };
  }

  const required = packet.requiredFields;
  for (const name of packet.schema.required) {
    if (required[name] === null || required[name] === undefined) {
      return {
        ok: false,
        error: new PacketInvalidDataError({
          code: "missing_required_field",
          message: `Missing required data field: "${name}"`,
          field: name,
          packetType: packet.packetType,
        }),
      };
    }
  }

  const extra = packet.validateFields();
  return extra ? { ok: false, error: extra } : { ok: true };
}

export function validatePacket(packet: Packet): true {
  const result = checkPacket(packet);
  if (!result.ok) throw result.error;
  return true;
}
