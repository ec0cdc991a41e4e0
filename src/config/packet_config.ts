import { config as loadEnv } from "dotenv";
import { z } from "zod";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type PacketConfig = {
  logLevel: LogLevel;
  prettyLogs: boolean;
  strictEnvelope: boolean;
};

const isTruthy = (value?: string) =>
  value !== undefined && ["1", "true", "yes", "on"].includes(value.toLowerCase());

const PacketEnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  PINO_PRETTY: z.string().optional(),
  PACKET_STRICT_ENVELOPE: z.string().optional(),
});

function defaultLogLevel(nodeEnv?: string): LogLevel {
  if (nodeEnv === "test") return "silent";
  if (nodeEnv === "production") return "info";
  return "debug";
}

export function loadPacketConfig(env: NodeJS.ProcessEnv = process.env): PacketConfig {
  const parsed = PacketEnvSchema.safeParse({
    NODE_ENV: env.NODE_ENV,
    // Empty values in .env files count as unset
    LOG_LEVEL: env.LOG_LEVEL || undefined,
    PINO_PRETTY: env.PINO_PRETTY,
    PACKET_STRICT_ENVELOPE: env.PACKET_STRICT_ENVELOPE,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid packet configuration: ${issues.join("; ")}`);
  }

  const vars = parsed.data;
  const isDev = vars.NODE_ENV !== "production";
  return {
    logLevel: vars.LOG_LEVEL ?? defaultLogLevel(vars.NODE_ENV),
    prettyLogs: isDev && vars.PINO_PRETTY === "1",
    strictEnvelope: isTruthy(vars.PACKET_STRICT_ENVELOPE),
  };
}
