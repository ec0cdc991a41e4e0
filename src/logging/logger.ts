import pino from "pino";

import type { PacketConfig } from "../config/packet_config";

export type PacketLogger = {
  debug: (obj: Record<string, unknown>, msg?: string) => void;
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
};

export function createPacketLogger(config: PacketConfig): PacketLogger {
  return pino({
    name: "packet-core",
    level: config.logLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(config.prettyLogs
      ? {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              singleLine: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
        }
      : {}),
  });
}
