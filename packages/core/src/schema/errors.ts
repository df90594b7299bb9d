import type { StandardSchemaV1 } from "@standard-schema/spec";

type PathSegment = PropertyKey | StandardSchemaV1.PathSegment;

/**
 * Convert a path array to dot-notation string.
 *
 * @example
 * formatPath(['user', 'email']) // "user.email"
 * formatPath(['items', 0, 'name']) // "items[0].name"
 * formatPath([]) // "(root)"
 */
export function formatPath(path?: ReadonlyArray<PathSegment>): string {
  if (!path || path.length === 0) {
    return "(root)";
  }

  return path.reduce<string>((acc, segment, index) => {
    const key = typeof segment === "object" && segment !== null &&
        "key" in segment
      ? segment.key
      : segment;

    if (typeof key === "number") {
      return `${acc}[${key}]`;
    }
    if (index === 0) {
      return String(key);
    }
    return `${acc}.${String(key)}`;
  }, "");
}

/**
 * Convert a TypeBox error pointer ("/user/email") to the same notation.
 */
export function formatPointer(pointer: string): string {
  return pointer.replace(/^\//, "").replace(/\//g, ".") || "(root)";
}
