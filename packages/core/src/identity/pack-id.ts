/**
 * Builds the identifier of a tagpack or actorpack: `prefix:relativePath`, or
 * the bare relative path when no prefix is configured.
 */
export function createPackId(prefix: string | undefined, relativePath: string): string {
  return prefix ? `${prefix}:${relativePath}` : relativePath;
}
