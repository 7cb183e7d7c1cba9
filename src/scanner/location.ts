export type PathSegment = string | number;

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export const ROOT_LOCATION = '$';

/**
 * Renders a key/index path as `a.b[1]`. Keys that are not identifiers use
 * bracket notation (`["x y"]`).
 */
export function formatLocation(path: readonly PathSegment[]): string {
  if (path.length === 0) {
    return ROOT_LOCATION;
  }
  let result = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      result += `[${segment}]`;
    } else if (IDENTIFIER.test(segment)) {
      result += result.length === 0 ? segment : `.${segment}`;
    } else {
      result += `[${JSON.stringify(segment)}]`;
    }
  }
  return result;
}
