import type { ListedSet } from './list-pipeline.js';

// ANSI color codes
const DIM = '\x1b[2m';
const GREEN = '\x1b[32m';
const RESET = '\x1b[0m';

export interface ListRenderOptions {
  /** Emit ANSI colors */
  color?: boolean;
}

function paint(code: string, text: string, color: boolean): string {
  return color ? `${code}${text}${RESET}` : text;
}

/**
 * Get tree connector character based on position
 */
export function getTreeConnector(isLast: boolean, hasBranches: boolean): string {
  if (isLast) {
    return hasBranches ? '└─┬ ' : '└── ';
  }
  return hasBranches ? '├─┬ ' : '├── ';
}

/**
 * Calculate child prefix based on parent prefix and position
 */
export function getChildPrefix(parentPrefix: string, isLast: boolean): string {
  return parentPrefix + (isLast ? '  ' : '│ ');
}

export function formatSetLabel(set: ListedSet, options: ListRenderOptions = {}): string {
  const color = options.color ?? false;
  const state = set.installed
    ? paint(GREEN, 'installed', color)
    : paint(DIM, 'uninstalled', color);
  return `${set.name} (${state})`;
}

/**
 * Render sets one per line, or as a tree of sets and members when members are present.
 */
export function renderSetList(sets: ListedSet[], options: ListRenderOptions = {}): string[] {
  const lines: string[] = [];

  for (let si = 0; si < sets.length; si++) {
    const set = sets[si];
    const label = formatSetLabel(set, options);

    if (!set.members) {
      lines.push(label);
      continue;
    }

    const isLastSet = si === sets.length - 1;
    const hasMembers = set.members.length > 0;
    lines.push(`${getTreeConnector(isLastSet, hasMembers)}${label}`);

    const childPrefix = getChildPrefix('', isLastSet);
    for (let mi = 0; mi < set.members.length; mi++) {
      const isLastMember = mi === set.members.length - 1;
      lines.push(`${childPrefix}${getTreeConnector(isLastMember, false)}${set.members[mi]}`);
    }
  }

  return lines;
}
