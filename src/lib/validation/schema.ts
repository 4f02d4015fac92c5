import { ValidationResult } from './validation-result.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type SchemaLeaf = 'string' | 'number' | 'boolean' | 'null';
export type SchemaNode = SchemaLeaf | SchemaNode[] | { [key: string]: SchemaNode };

export const REPAIR_MISSING_NULLS = 'missing_nulls';
export type RepairFeature = typeof REPAIR_MISSING_NULLS;

type JsonObject = { [key: string]: JsonValue };

function isObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Plain assignment would treat a `__proto__` key as the prototype. */
function setOwn<T>(target: { [key: string]: T }, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function isSchemaObject(node: SchemaNode): node is { [key: string]: SchemaNode } {
  return typeof node === 'object' && !Array.isArray(node);
}

/**
 * Reduce a parsed JSON value to its shape. Values are dropped; array order and
 * length and object keys are kept.
 */
export function capture(value: JsonValue): SchemaNode {
  if (Array.isArray(value)) {
    return value.map((item) => capture(item));
  }
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'object') {
    const out: { [key: string]: SchemaNode } = {};
    for (const [key, child] of Object.entries(value)) {
      setOwn(out, key, capture(child));
    }
    return out;
  }
  return typeof value === 'string' ? 'string' : typeof value === 'number' ? 'number' : 'boolean';
}

export function sameShape(a: SchemaNode, b: SchemaNode): boolean {
  if (typeof a === 'string' || typeof b === 'string') {
    return a === b;
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    return a.every((node, index) => {
      const other = b[index];
      return other !== undefined && sameShape(node, other);
    });
  }
  if (!isSchemaObject(a) || !isSchemaObject(b)) {
    return false;
  }
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) {
    return false;
  }
  return keys.every((key) => {
    const left = a[key];
    const right = b[key];
    return left !== undefined && right !== undefined && Object.hasOwn(b, key) && sameShape(left, right);
  });
}

/** Compare shapes captured before and after translation. */
export function validate(before: SchemaNode, after: SchemaNode): ValidationResult {
  if (sameShape(before, after)) {
    return ValidationResult.success();
  }
  return ValidationResult.failure(['Structure mismatch after translation']);
}

/**
 * Undo known, harmless backend damage in `after` using `before` as reference.
 *
 * `missing_nulls`: keys and array slots that were `null` in `before` and are gone
 * from `after` are put back as `null`. Positions that held real data stay
 * missing; they are never invented.
 */
export function applyRepairs(before: JsonValue, after: JsonValue, features: readonly RepairFeature[]): JsonValue {
  if (features.includes(REPAIR_MISSING_NULLS)) {
    return repairMissingNulls(before, after);
  }
  return after;
}

function repairMissingNulls(before: JsonValue, after: JsonValue): JsonValue {
  if (Array.isArray(before) && Array.isArray(after)) {
    const out = after.map((item, index) => {
      const original = before[index];
      return original === undefined ? item : repairMissingNulls(original, item);
    });
    // Slots past the end of `after` are the missing ones; indexes stay contiguous.
    for (const original of before.slice(after.length)) {
      if (original === null) {
        out.push(null);
      }
    }
    return out;
  }

  if (isObject(before) && isObject(after)) {
    const out: JsonObject = { ...after };
    for (const [key, original] of Object.entries(before)) {
      const current = after[key];
      if (!Object.hasOwn(after, key) || current === undefined) {
        if (original === null) {
          setOwn(out, key, null);
        }
        continue;
      }
      setOwn(out, key, repairMissingNulls(original, current));
    }
    return out;
  }

  return after;
}

export const Schema = {
  REPAIR_MISSING_NULLS,
  capture,
  validate,
  applyRepairs,
} as const;
