import type { FieldValue } from "../contracts/envelope";
import { PacketInvalidDataError } from "./packet_errors";
import { isDateFieldName, parseDateField, type PacketSchema } from "./packet_schema";

export type FieldRecord = Record<string, FieldValue | null>;

export interface RequiredFieldAccessor {
  get(): FieldValue | null;
  set(value: FieldValue | null): void;
  /** Writes null; the key stays so validation still sees the field. */
  reset(): void;
}

export interface AllowedFieldAccessor {
  get(): FieldValue | null;
  set(value: FieldValue | null): void;
}

export type FieldAccessors<R extends string, A extends string> = {
  required: ReadonlyMap<R, RequiredFieldAccessor>;
  allowed: ReadonlyMap<A, AllowedFieldAccessor>;
};

/**
 * Per-instance storage for a packet's fields. Required names are seeded with
 * null up front; allowed names only appear once set; anything else lands in
 * the extension store.
 */
export class FieldStore {
  readonly required = new Map<string, FieldValue | null>();
  readonly allowed = new Map<string, FieldValue | null>();
  readonly extension = new Map<string, FieldValue | null>();

  constructor(private readonly schema: PacketSchema) {
    for (const name of schema.required) {
      this.required.set(name, null);
    }
  }

  isRequired(name: string): boolean {
    return this.required.has(name);
  }

  isAllowed(name: string): boolean {
    return this.schema.allowed.includes(name);
  }

  /** Routes by name: required, then allowed, then extension. */
  set(name: string, value: FieldValue | null): void {
    if (this.isRequired(name)) {
      this.required.set(name, normalizeFieldValue(name, value));
    } else if (this.isAllowed(name)) {
      this.allowed.set(name, normalizeFieldValue(name, value));
    } else {
      this.extension.set(name, value);
    }
  }

  get(name: string): FieldValue | null {
    return this.required.get(name) ?? this.allowed.get(name) ?? this.extension.get(name) ?? null;
  }

  reset(name: string): void {
    if (this.isRequired(name)) {
      this.required.set(name, null);
      return;
    }
    this.allowed.delete(name);
    this.extension.delete(name);
  }
}

function normalizeFieldValue(name: string, value: FieldValue | null): FieldValue | null {
  return isDateFieldName(name) ? parseDateField(name, value) : value;
}

/**
 * Generates one accessor per declared field name. The same mechanism serves
 * every packet type; only the schema's name lists vary.
 */
export function buildFieldAccessors<R extends string, A extends string>(
  schema: PacketSchema<string, R, A>,
  store: FieldStore
): FieldAccessors<R, A> {
  const required = new Map<R, RequiredFieldAccessor>();
  for (const name of schema.required) {
    required.set(name, {
      get: () => store.required.get(name) ?? null,
      set: (value) => {
        store.required.set(name, normalizeFieldValue(name, value));
      },
      reset: () => {
        store.required.set(name, null);
      },
    });
  }

  const allowed = new Map<A, AllowedFieldAccessor>();
  for (const name of schema.allowed) {
    allowed.set(name, {
      get: () => store.allowed.get(name) ?? null,
      set: (value) => {
        store.allowed.set(name, normalizeFieldValue(name, value));
      },
    });
  }

  return { required, allowed };
}

export function unknownField(name: string, packetType: string): PacketInvalidDataError {
  return new PacketInvalidDataError({
    code: "unknown_field",
    message: `Packet type '${packetType}' declares no field "${name}"`,
    field: name,
    packetType,
  });
}

export function toFieldRecord(map: ReadonlyMap<string, FieldValue | null>): FieldRecord {
  return Object.fromEntries(map);
}
