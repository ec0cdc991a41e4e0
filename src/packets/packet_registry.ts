import { loadPacketConfig, type PacketConfig } from "../config/packet_config";
import { createPacketLogger, type PacketLogger } from "../logging/logger";
import { Packet, systemClock, type AnyPacketClass, type Clock } from "./packet";
import { PacketInvalidTypeError } from "./packet_errors";
import { replyPacket, type ReplyOptions } from "./reply_resolver";
import { fromDict, fromJson, safeFromDict, safeFromJson, type DecodeResult } from "./serializer";

export type PacketRegistryOptions = {
  log?: PacketLogger;
  /** Require DATA_TYPE "packet" on inbound envelopes. Defaults to PACKET_STRICT_ENVELOPE. */
  strictEnvelope?: boolean;
  /** Time source for packets decoded without a header date, and for replies. */
  clock?: Clock;
};

export type ResolvedRegistryOptions = Required<PacketRegistryOptions>;

let defaultLogger: PacketLogger | undefined;

function resolveOptions(options: PacketRegistryOptions): ResolvedRegistryOptions {
  // Environment is only read for what the caller left out
  let config: PacketConfig | undefined;
  const loadConfig = () => (config ??= loadPacketConfig());

  return {
    log: options.log ?? (defaultLogger ??= createPacketLogger(loadConfig())),
    strictEnvelope: options.strictEnvelope ?? loadConfig().strictEnvelope,
    clock: options.clock ?? systemClock,
  };
}

export function unknownType(packetType: string): PacketInvalidTypeError {
  return new PacketInvalidTypeError({
    code: "unknown_type",
    message: `No packet type matches provided '${packetType}'`,
    packetType,
  });
}

/**
 * Table of packet types keyed by type identifier. Built once from an explicit
 * list of defined packet classes and never mutated afterwards.
 *
 * @example
 * ```ts
 * const registry = createPacketRegistry([RequestAccountCreate, NotifyAccountCreate]);
 * const packet = registry.fromJson(text);
 * const reply = registry.replyTo(packet, { packetId: "1002" });
 * ```
 */
export class PacketRegistry {
  readonly options: ResolvedRegistryOptions;
  private readonly byType: ReadonlyMap<string, AnyPacketClass>;

  constructor(types: readonly AnyPacketClass[], options: PacketRegistryOptions = {}) {
    this.options = Object.freeze(resolveOptions(options));

    const byType = new Map<string, AnyPacketClass>();
    for (const packetClass of types) {
      const type = packetClass.schema.type;
      const existing = byType.get(type);
      if (existing === packetClass) continue;
      if (existing) {
        throw new PacketInvalidTypeError({
          code: "duplicate_type",
          message: `Packet type '${type}' is registered more than once`,
          packetType: type,
        });
      }
      byType.set(type, packetClass);
    }
    this.byType = byType;

    this.options.log.debug({ types: [...byType.keys()] }, "packet.registry: built");
  }

  types(): string[] {
    return [...this.byType.keys()];
  }

  has(packetType: string): boolean {
    return this.byType.has(packetType);
  }

  find(packetOrType: string | Packet): AnyPacketClass | undefined {
    if (typeof packetOrType === "string") {
      return this.byType.get(packetOrType);
    }
    // The runtime class itself must be registered, not just an ancestor
    const packetClass = this.byType.get(packetOrType.packetType);
    return packetClass && packetOrType.constructor === packetClass ? packetClass : undefined;
  }

  lookup(packetOrType: string | Packet): AnyPacketClass {
    const packetClass = this.find(packetOrType);
    if (!packetClass) {
      throw unknownType(typeof packetOrType === "string" ? packetOrType : packetOrType.packetType);
    }
    return packetClass;
  }

  fromDict(data: unknown): Packet {
    return fromDict(this, data);
  }

  fromJson(text: string): Packet {
    return fromJson(this, text);
  }

  safeFromDict(data: unknown): DecodeResult {
    return safeFromDict(this, data);
  }

  safeFromJson(text: string): DecodeResult {
    return safeFromJson(this, text);
  }

  replyTo(source: Packet, options: ReplyOptions = {}): Packet {
    return replyPacket(this, source, options);
  }
}

export function createPacketRegistry(
  types: readonly AnyPacketClass[],
  options?: PacketRegistryOptions
): PacketRegistry {
  return new PacketRegistry(types, options);
}

/**
 * Fails when a declared packet class is missing from the registry, or when a
 * registered type names a reply type the registry cannot resolve.
 */
export function assertRegistryComplete(registry: PacketRegistry, declared: readonly AnyPacketClass[]): void {
  for (const packetClass of declared) {
    if (registry.find(packetClass.schema.type) !== packetClass) {
      throw unknownType(packetClass.schema.type);
    }
  }
  for (const type of registry.types()) {
    for (const reply of registry.lookup(type).schema.replies) {
      if (!registry.has(reply)) throw unknownType(reply);
    }
  }
}
