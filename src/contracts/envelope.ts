import { z } from "zod";

export const PACKET_DATA_TYPE = "packet" as const;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

// Values a packet holds in memory; dates only become text on the wire.
export type FieldValue = JsonValue | Date;

export type PacketHeader = {
  packet_id: string | null;
  date: string;
  type: string;
  expected_reply_list: string[];
  in_reply_to?: string;
};

export type PacketEnvelope = {
  DATA_TYPE: typeof PACKET_DATA_TYPE;
  header: PacketHeader;
  body: Record<string, JsonValue>;
};

const PacketIdSchema = z
  .union([z.string(), z.number().int()])
  .nullable()
  .transform((value) => (value === null ? null : String(value)));

// Inbound envelopes come from other systems; unknown header keys are tolerated.
export const PacketEnvelopeInputSchema = z.object({
  DATA_TYPE: z.string().optional(),
  type: z.string().min(1).optional(),
  header: z.object({
    packet_id: PacketIdSchema.optional(),
    date: z.string().min(1).optional(),
    type: z.string().min(1).optional(),
    expected_reply_list: z.array(z.string()).optional(),
    in_reply_to: PacketIdSchema.optional(),
  }),
  body: z.record(z.string(), JsonValueSchema).default({}),
}).superRefine((value, ctx) => {
  if (!value.header.type && !value.type) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["header", "type"],
      message: "envelope must name a packet type",
    });
  }
});

export type PacketEnvelopeInput = z.infer<typeof PacketEnvelopeInputSchema>;
