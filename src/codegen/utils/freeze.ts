/**
 * Recursively freeze a value. Map and Set entries are frozen too, although
 * the collections themselves stay mutable at runtime.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return value;
  }

  Object.freeze(value);

  if (value instanceof Map || value instanceof Set) {
    value.forEach((entry: unknown) => deepFreeze(entry));
  } else {
    Object.values(value).forEach((entry: unknown) => deepFreeze(entry));
  }

  return value;
}
