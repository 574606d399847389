import {
  INT_MAX,
  INT_MIN,
  isPrimitiveType,
  type FieldType,
  type PrimitiveType,
} from "./RecordSchema";

const LONE_SURROGATE = /\p{Surrogate}/u;

/** JSON Schema `pattern` for strings that UTF-8 can carry unchanged. */
export const WELL_FORMED_PATTERN = "^\\P{Surrogate}*$";

export function isWellFormed(value: string): boolean {
  return !LONE_SURROGATE.test(value);
}

/** Whether a string, or a map key or value, holds an unpaired surrogate. */
export function hasLoneSurrogate(value: unknown): boolean {
  if (typeof value === "string") return !isWellFormed(value);
  if (!isPlainObject(value)) return false;
  return Object.entries(value).some(
    ([key, item]) => !isWellFormed(key) || (typeof item === "string" && !isWellFormed(item))
  );
}

export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "number" && Number.isInteger(value)) return "integer";
  return typeof value;
}

export function isPlainObject(
  value: unknown
): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function matchesPrimitive(type: PrimitiveType, value: unknown): boolean {
  switch (type) {
    case "string":
      return typeof value === "string" && isWellFormed(value);
    case "int":
      return Number.isInteger(value) && Number(value) >= INT_MIN && Number(value) <= INT_MAX;
    case "long":
      return Number.isSafeInteger(value);
    case "double":
      return typeof value === "number";
    case "boolean":
      return typeof value === "boolean";
  }
}

/** Whether `value` is a legal value for a field of `type`. */
export function matchesType(type: FieldType, value: unknown): boolean {
  if (isPrimitiveType(type)) return matchesPrimitive(type, value);

  if (type.type === "enum") {
    return typeof value === "string" && type.symbols.includes(value);
  }

  return (
    isPlainObject(value) &&
    Object.entries(value).every(
      ([key, item]) => isWellFormed(key) && matchesPrimitive(type.values, item)
    )
  );
}
