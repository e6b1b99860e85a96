/**
 * Set algebra over package-name collections.
 */

export function difference(a: Iterable<string>, b: Iterable<string>): Set<string> {
  const exclude = new Set(b);
  const result = new Set<string>();
  for (const item of a) {
    if (!exclude.has(item)) {
      result.add(item);
    }
  }
  return result;
}

export function intersection(a: Iterable<string>, b: Iterable<string>): Set<string> {
  const keep = new Set(b);
  const result = new Set<string>();
  for (const item of a) {
    if (keep.has(item)) {
      result.add(item);
    }
  }
  return result;
}

/**
 * Sorted copy, for stable output and for passing to external commands.
 */
export function sorted(items: Iterable<string>): string[] {
  return [...items].sort();
}

/**
 * Trim package arguments, dropping blanks and duplicates while keeping order.
 */
export function normalizePackageArgs(args: readonly string[]): Set<string> {
  const result = new Set<string>();
  for (const arg of args) {
    const trimmed = arg.trim();
    if (trimmed !== '') {
      result.add(trimmed);
    }
  }
  return result;
}

export function formatPackageList(items: Iterable<string>): string {
  const list = sorted(items);
  return list.length === 0 ? '(none)' : list.join(' ');
}
