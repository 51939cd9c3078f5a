/**
 * Assigns an own enumerable entry, so keys such as `__proto__` stay data
 * instead of reaching the prototype setter.
 */
export function setEntry<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}
