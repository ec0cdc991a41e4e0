export type PacketInvalidTypeCode =
  | "unknown_type"
  | "duplicate_type"
  | "invalid_schema"
  | "no_reply_expected"
  | "ambiguous_reply"
  | "unexpected_reply";

export type PacketInvalidDataCode =
  | "missing_required_field"
  | "unknown_field"
  | "invalid_date"
  | "invalid_field_value"
  | "invalid_reply_reference"
  | "malformed_envelope"
  | "malformed_json";

export interface PacketInvalidTypeDetails {
  code: PacketInvalidTypeCode;
  message: string;
  // The identifier that could not be resolved, or the source packet's type
  packetType?: string;
  requestedType?: string;
  expectedReplies?: string[];
}

export interface PacketInvalidDataDetails {
  code: PacketInvalidDataCode;
  message: string;
  field?: string;
  packetType?: string;
  // Bounded: paths and messages only, never the payload
  issues?: string[];
}

export class PacketInvalidTypeError extends Error {
  public readonly code: PacketInvalidTypeCode;
  public readonly details: PacketInvalidTypeDetails;

  constructor(details: PacketInvalidTypeDetails) {
    super(details.message);
    this.name = "PacketInvalidTypeError";
    this.code = details.code;
    this.details = details;
  }

  toJSON() {
    return {
      error: "invalid_type",
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export class PacketInvalidDataError extends Error {
  public readonly code: PacketInvalidDataCode;
  public readonly details: PacketInvalidDataDetails;

  constructor(details: PacketInvalidDataDetails) {
    super(details.message);
    this.name = "PacketInvalidDataError";
    this.code = details.code;
    this.details = details;
  }

  toJSON() {
    return {
      error: "invalid_data",
      code: this.code,
      message: this.message,
      details: {
        ...this.details,
        issues: this.details.issues?.slice(0, 20),
      },
    };
  }
}

export type PacketError = PacketInvalidTypeError | PacketInvalidDataError;

export function isPacketError(value: unknown): value is PacketError {
  return value instanceof PacketInvalidTypeError || value instanceof PacketInvalidDataError;
}
