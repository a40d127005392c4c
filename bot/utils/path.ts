export type PathSegment = string | number;

/**
 * Walk a nested object/array structure along `path`.
 * String segments index plain objects, numeric segments index arrays.
 * Any missing step, wrong shape or out-of-range index yields `fallback`.
 */
export function getPath(source: unknown, path: readonly PathSegment[], fallback: unknown): unknown {
  let current: unknown = source;

  for (const segment of path) {
    if (typeof segment === "number") {
      if (!Array.isArray(current) || !Number.isInteger(segment)) return fallback;
      if (segment < 0 || segment >= current.length) return fallback;
      current = current[segment];
    } else {
      if (current === null || typeof current !== "object" || Array.isArray(current)) return fallback;
      if (!Object.prototype.hasOwnProperty.call(current, segment)) return fallback;
      current = Reflect.get(current, segment);
    }

    if (current === undefined || current === null) return fallback;
  }

  return current;
}

// Same walk, but only a string result counts as found
export function getString(source: unknown, path: readonly PathSegment[], fallback: string): string {
  const value = getPath(source, path, fallback);
  return typeof value === "string" ? value : fallback;
}
