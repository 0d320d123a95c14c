/**
 * Stores `value` as an own enumerable property. Keys come from user JSON, and
 * plain assignment of `__proto__` would replace the prototype instead.
 */
export const setOwn = <T>(target: Record<string, T>, key: string, value: T) => {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
};
