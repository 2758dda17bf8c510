function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}

/**
 * Structural copy of plain data (objects, arrays, primitives).
 */
export function deepCopy<T>(value: T): T {
  return structuredClone(value);
}

/**
 * Fills keys that are missing from `target` with deep copies of the template's values,
 * descending into nested objects. Existing keys are never overwritten.
 */
export function reconcile(target: object, template: object): void {
  for (const [key, templateValue] of Object.entries(template)) {
    const existing: unknown = Reflect.get(target, key);
    if (existing === undefined) {
      Reflect.set(target, key, deepCopy(templateValue));
    } else if (isPlainObject(existing) && isPlainObject(templateValue)) {
      reconcile(existing, templateValue);
    }
  }
}
