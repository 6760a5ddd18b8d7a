import { expectObject, fail, type FieldPath } from "../validate";

export interface VariantPayload<T extends string> {
  type: T;
  param: Record<string, unknown>;
}

/**
 * Reads the wire form of a recognition or action: a bare type name, or
 * `{ "type": ..., "param": {...} }` where either key may be omitted.
 * A missing type falls back to `fallback`.
 */
export function readVariantPayload<T extends string>(
  value: unknown,
  fallback: T,
  isType: (name: string) => name is T,
  path: FieldPath,
  label: string,
): VariantPayload<T> {
  const checkType = (name: unknown, at: FieldPath): T => {
    if (typeof name !== "string") {
      return fail(at, `expected a ${label} type name`);
    }
    if (!isType(name)) {
      return fail(at, `unknown ${label} type "${name}"`);
    }
    return name;
  };

  if (value === undefined) {
    return { type: fallback, param: {} };
  }
  if (typeof value === "string") {
    return { type: checkType(value, path), param: {} };
  }

  const payload = expectObject(value, path);
  for (const key of Object.keys(payload)) {
    if (key !== "type" && key !== "param") {
      fail([...path, key], `unexpected key "${key}", expected "type" or "param"`);
    }
  }

  const type = payload.type === undefined ? fallback : checkType(payload.type, [...path, "type"]);
  const param = payload.param === undefined ? {} : expectObject(payload.param, [...path, "param"]);
  return { type, param: { ...param } };
}

export function withShorthand<T extends string>(
  payload: VariantPayload<T>,
  shorthand: Record<string, unknown>,
): VariantPayload<T> {
  return { type: payload.type, param: { ...shorthand, ...payload.param } };
}
