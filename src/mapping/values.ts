/**
 * Shape checks between domain field values and stored property values.
 */

import type { EntityId, PropertyValue, ScalarValue } from "../ontology/types.js";
import { MappingValueError } from "./errors.js";

export function readField(obj: object, fieldName: string): unknown {
  return Reflect.get(obj, fieldName);
}

export function isScalarValue(value: unknown): value is ScalarValue {
  return (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof Date
  );
}

export function isDomainObject(value: unknown): value is object {
  return typeof value === "object" && value !== null;
}

/**
 * Elements of a multi-valued or ordered field, in iteration order.
 */
export function toElements(value: unknown, fieldName: string): unknown[] {
  if (Array.isArray(value) || value instanceof Set) {
    return Array.from<unknown>(value);
  }
  throw new MappingValueError(
    `Field "${fieldName}" must be an array or a Set, got ${describeValue(value)}`
  );
}

export function toScalar(value: unknown, fieldName: string): ScalarValue {
  if (isScalarValue(value)) return value;
  throw new MappingValueError(
    `Field "${fieldName}" must hold a string, number, boolean or Date, got ${describeValue(value)}`
  );
}

export function toDomainObject(value: unknown, fieldName: string): object {
  if (isDomainObject(value)) return value;
  throw new MappingValueError(
    `Field "${fieldName}" must reference an object, got ${describeValue(value)}`
  );
}

export function toEntityId(value: ScalarValue): EntityId {
  if (typeof value === "string") return value;
  throw new MappingValueError(
    `Expected an individual, got ${describeValue(value)}`
  );
}

/**
 * Stored values as a list, whatever the property's arity.
 */
export function storedList(value: PropertyValue): ScalarValue[] {
  if (value === null) return [];
  if (Array.isArray(value)) return value;
  return [value];
}

/**
 * Stored value as a single value; null when nothing is stored.
 */
export function storedSingle(value: PropertyValue): ScalarValue | null {
  if (Array.isArray(value)) return value[0] ?? null;
  return value;
}

export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Date) return "Date";
  return typeof value;
}
