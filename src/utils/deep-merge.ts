export type PlainObject = Record<string, unknown>;

export function isPlainObject(item: unknown): item is PlainObject {
  return typeof item === 'object' && item !== null && !Array.isArray(item);
}

/**
 * Merge `source` into a copy of `target`; nested objects merge, everything else is replaced
 */
export function deepMerge(target: PlainObject, source?: PlainObject): PlainObject {
  if (!source) {
    return { ...target };
  }

  const result: PlainObject = { ...target };

  for (const key in source) {
    if (Object.hasOwn(source, key)) {
      const sourceValue = source[key];
      const targetValue = result[key];

      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        result[key] = deepMerge(targetValue, sourceValue);
      } else {
        result[key] = sourceValue;
      }
    }
  }

  return result;
}
