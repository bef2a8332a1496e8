/**
 * Deep Freeze — freezes an object and every nested object and array.
 * Returns the same reference.
 */
export function deepFreeze<T>(obj: T): T {
  if (obj === null || typeof obj !== "object") return obj;
  for (const val of Object.values(obj)) {
    if (val !== null && typeof val === "object" && !Object.isFrozen(val)) {
      deepFreeze(val);
    }
  }
  Object.freeze(obj);
  return obj;
}
