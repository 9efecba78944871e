// /src/lib/deepFreeze.ts

/**
 * Recursively freeze plain objects and arrays. Maps are frozen as objects only;
 * consumers read them through ReadonlyMap.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    if (!(value instanceof Map)) {
      for (const child of Object.values(value)) deepFreeze(child);
    }
  }
  return value;
}
