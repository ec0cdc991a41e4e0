import type { FieldValue } from "../contracts/envelope";
import { PacketInvalidDataError, PacketInvalidTypeError } from "./packet_errors";

export type PacketSchema<
  T extends string = string,
  R extends string = string,
  A extends string = string,
> = {
  readonly type: T;
  readonly required: readonly R[];
  readonly allowed: readonly A[];
  readonly replies: readonly string[];
};

export type PacketSchemaDefinition<T extends string, R extends string, A extends string> = {
  type: T;
  required: readonly R[];
  allowed?: readonly A[];
  replies?: readonly string[];
};

/**
 * Fields whose name contains "Date" hold timestamps. This is a naming
 * convention carried by the protocol, not a declared field type.
 */
export const DATE_FIELD_MARKER = "Date";

export function isDateFieldName(name: string): boolean {
  return name.includes(DATE_FIELD_MARKER);
}

function invalidSchema(type: string, message: string): PacketInvalidTypeError {
  return new PacketInvalidTypeError({
    code: "invalid_schema",
    message: `Invalid schema for packet type '${type}': ${message}`,
    packetType: type,
  });
}

function findDuplicate(names: readonly string[]): string | undefined {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) return name;
    seen.add(name);
  }
  return undefined;
}

export function createPacketSchema<T extends string, R extends string, A extends string>(
  definition: PacketSchemaDefinition<T, R, A>
): PacketSchema<T, R, A> {
  const { type } = definition;
  const required = [...definition.required];
  const allowed = [...(definition.allowed ?? [])];
  const replies = [...(definition.replies ?? [])];

  if (type.trim().length === 0) {
    throw invalidSchema(type, "type identifier must not be empty");
  }

  const emptyName = [...required, ...allowed].find((name) => name.length === 0);
  if (emptyName !== undefined) {
    throw invalidSchema(type, "field names must not be empty");
  }

  const duplicate = findDuplicate(required) ?? findDuplicate(allowed) ?? findDuplicate(replies);
  if (duplicate !== undefined) {
    throw invalidSchema(type, `'${duplicate}' is declared more than once`);
  }

  const requiredNames = new Set<string>(required);
  const overlap = allowed.find((name) => requiredNames.has(name));
  if (overlap !== undefined) {
    throw invalidSchema(type, `'${overlap}' is both required and allowed`);
  }

  return Object.freeze({
    type,
    required: Object.freeze(required),
    allowed: Object.freeze(allowed),
    replies: Object.freeze(replies),
  });
}

// Date-time text with no offset; read as UTC so the host time zone never leaks in.
const ZONELESS_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

function parseDateText(text: string): Date {
  const zoneless = ZONELESS_DATE_TIME.exec(text.trim());
  return zoneless ? new Date(`${zoneless[1]}T${zoneless[2]}Z`) : new Date(text);
}

/**
 * Parses a value written to a date-named field. Null clears the field;
 * anything that is not a valid Date or date-time text is rejected. Text
 * without an offset is taken as UTC.
 */
export function parseDateField(name: string, value: FieldValue | null): Date | null {
  if (value === null) return null;

  const parsed = value instanceof Date
    ? new Date(value.getTime())
    : typeof value === "string"
      ? parseDateText(value)
      : null;

  if (!parsed || Number.isNaN(parsed.getTime())) {
    throw new PacketInvalidDataError({
      code: "invalid_date",
      message: `Field "${name}" must be a date-time, got ${describeValue(value)}`,
      field: name,
    });
  }
  return parsed;
}

function describeValue(value: FieldValue): string {
  if (typeof value === "string") return `"${value.slice(0, 64)}"`;
  if (value instanceof Date) return "an invalid Date";
  if (Array.isArray(value)) return "an array";
  return typeof value;
}
