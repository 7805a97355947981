function assignIfDefined<T, K extends keyof T>(
  target: T,
  key: K,
  value: T[K] | undefined,
): boolean {
  if (value === undefined) return false;
  target[key] = value;
  return true;
}

/**
 * Copies every field of `patch` that is not undefined onto `target`.
 * Absent fields leave the target untouched. Returns the keys that were copied.
 */
export function mergeDefined<T extends object>(
  target: T,
  patch: Partial<T>,
): Array<Extract<keyof T, string>> {
  const applied: Array<Extract<keyof T, string>> = [];

  for (const key in patch) {
    if (!Object.hasOwn(patch, key)) continue;
    if (assignIfDefined(target, key, patch[key])) {
      applied.push(key);
    }
  }

  return applied;
}
