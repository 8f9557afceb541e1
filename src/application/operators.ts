import type { ConditionOperator, PropertyValue } from '../domain/index.js';

/**
 * Structural equality over PropertyValue.
 *
 * No coercion: `1` and `"1"` differ, key order of objects is irrelevant.
 */
export function valuesEqual(a: PropertyValue, b: PropertyValue): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;

  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => {
      const other = b[i];
      return other !== undefined && valuesEqual(item, other);
    });
  }
  if (Array.isArray(b)) return false;

  if (typeof a === 'object' && typeof b === 'object') {
    const keysA = Object.keys(a);
    if (keysA.length !== Object.keys(b).length) return false;
    return keysA.every((key) => {
      const left = a[key];
      const right = b[key];
      return left !== undefined && right !== undefined && valuesEqual(left, right);
    });
  }

  return false;
}

/**
 * Numeric view of a value for ordering comparisons.
 * Finite numbers and numeric strings convert; everything else is `null`.
 */
export function toNumber(value: PropertyValue): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return null;
    const n = Number(trimmed);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function compareNumbers(actual: PropertyValue, expected: PropertyValue, cmp: (a: number, b: number) => boolean): boolean {
  const a = toNumber(actual);
  const b = toNumber(expected);
  if (a === null || b === null) return false;
  return cmp(a, b);
}

function compareStrings(actual: PropertyValue, expected: PropertyValue, cmp: (a: string, b: string) => boolean): boolean {
  if (typeof actual !== 'string' || typeof expected !== 'string') return false;
  return cmp(actual, expected);
}

/**
 * Applies a condition operator. `actual === undefined` means the fact is
 * missing, which never matches, for any operator.
 */
export function compareValues(
  actual: PropertyValue | undefined,
  operator: ConditionOperator,
  expected: PropertyValue,
): boolean {
  if (actual === undefined) return false;

  switch (operator) {
    case 'equals':
      return valuesEqual(actual, expected);
    case 'not_equals':
      return !valuesEqual(actual, expected);
    case 'greater_than':
      return compareNumbers(actual, expected, (a, b) => a > b);
    case 'less_than':
      return compareNumbers(actual, expected, (a, b) => a < b);
    case 'contains':
      return compareStrings(actual, expected, (a, b) => a.includes(b));
    case 'starts_with':
      return compareStrings(actual, expected, (a, b) => a.startsWith(b));
    case 'ends_with':
      return compareStrings(actual, expected, (a, b) => a.endsWith(b));
    case 'in':
      return Array.isArray(expected) && expected.some((candidate) => valuesEqual(candidate, actual));
    case 'not_in':
      return Array.isArray(expected) && !expected.some((candidate) => valuesEqual(candidate, actual));
  }
}
