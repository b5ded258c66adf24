/**
 * Relative path helpers.
 *
 * Relative paths are always slash-separated and never start or end with a
 * slash. The root is the empty string.
 */

/**
 * Normalize a user-supplied relative path: backslashes become slashes,
 * leading "./" and surrounding slashes are dropped, "." means the root.
 */
export function normalizeRelativePath(path: string): string {
  const segments = path
    .replace(/\\/g, "/")
    .split("/")
    .filter((segment) => segment !== "" && segment !== ".");
  return segments.join("/");
}

export function joinRelative(parent: string, name: string): string {
  return parent === "" ? name : `${parent}/${name}`;
}

/**
 * Parent of a relative path. The parent of a top-level entry is the root ("");
 * the root has no parent.
 */
export function parentOf(relativePath: string): string | null {
  if (relativePath === "") return null;
  const slash = relativePath.lastIndexOf("/");
  return slash === -1 ? "" : relativePath.slice(0, slash);
}

export function baseName(relativePath: string): string {
  const slash = relativePath.lastIndexOf("/");
  return slash === -1 ? relativePath : relativePath.slice(slash + 1);
}

/**
 * Compare two names by UTF-16 code units. Locale-independent so the order
 * is the same on every machine.
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
