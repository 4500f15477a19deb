/**
 * Adds an own enumerable property. Unlike assignment, a key such as `__proto__` becomes a
 * plain entry instead of replacing the prototype.
 */
export function defineEntry(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  });
}
