/**
 * Package Set
 *
 * One named, file-backed collection of package names plus its installed
 * marker. Identity is the name alone; members are read from disk on every
 * call so a workflow never sees a stale view between steps.
 */

import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import * as path from 'path';
import type { PkgsetDirectories } from '../../types/index.js';
import { COMMENT_PREFIX } from '../../constants/index.js';
import { ensureDir, entryExists, isFile, readTextFile, removeFile } from '../../utils/fs.js';
import { splitLines, rewriteLines } from '../../utils/line-store.js';
import { FileSystemError, InvalidSetNameError, SetExistsError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export function isCommentLine(stripped: string): boolean {
  return stripped.startsWith(COMMENT_PREFIX);
}

/**
 * Strip a line and return the package name it declares, or null for
 * blank and comment lines.
 */
export function parseMemberLine(line: string): string | null {
  const stripped = line.trim();
  if (stripped === '' || isCommentLine(stripped)) {
    return null;
  }
  return stripped;
}

/**
 * Throw unless `name` can be used as a file name inside the sets root.
 */
export function validateSetName(name: string): void {
  if (name.length === 0) {
    throw new InvalidSetNameError(name, 'name is empty');
  }
  if (name.includes('/') || name.includes('\\')) {
    throw new InvalidSetNameError(name, 'name must not contain path separators');
  }
  if (name.startsWith('.')) {
    throw new InvalidSetNameError(name, 'name must not start with "."');
  }
  if (name !== name.trim()) {
    throw new InvalidSetNameError(name, 'name must not start or end with whitespace');
  }
}

export class PackageSet {
  readonly name: string;
  private readonly dirs: PkgsetDirectories;

  constructor(name: string, dirs: PkgsetDirectories) {
    validateSetName(name);
    this.name = name;
    this.dirs = dirs;
  }

  get filePath(): string {
    return path.join(this.dirs.sets, this.name);
  }

  get markerPath(): string {
    return path.join(this.dirs.installedSets, this.name);
  }

  equals(other: PackageSet): boolean {
    return this.name === other.name;
  }

  toString(): string {
    return this.name;
  }

  async exists(): Promise<boolean> {
    return isFile(this.filePath);
  }

  /**
   * Create the set with `pkgs` as its first members.
   */
  async create(pkgs: Iterable<string>): Promise<Set<string>> {
    if (await this.exists()) {
      throw new SetExistsError(this.name);
    }
    return this.merge(pkgs);
  }

  /**
   * Current members: stripped lines that are neither blank nor comments.
   */
  async get(): Promise<Set<string>> {
    if (!(await this.exists())) {
      throw new FileSystemError(`Set file is missing: ${this.filePath}`, { setName: this.name });
    }
    const members = new Set<string>();
    for (const line of splitLines(await readTextFile(this.filePath))) {
      const member = parseMemberLine(line);
      if (member !== null) {
        members.add(member);
      }
    }
    return members;
  }

  /**
   * Append every package not already present as a line of the set file.
   *
   * A package mentioned only by a comment line (`# foo`) counts as present,
   * so merging never re-adds something the user commented out. The read and
   * the append share one file handle.
   *
   * @returns the packages that were appended, in input order
   */
  async merge(pkgs: Iterable<string>): Promise<Set<string>> {
    await ensureDir(this.dirs.sets);

    let handle: FileHandle;
    try {
      handle = await fs.open(this.filePath, 'a+');
    } catch (error) {
      throw new FileSystemError(`Failed to open set file: ${this.filePath}`, { setName: this.name, error });
    }

    try {
      const content = await handle.readFile({ encoding: 'utf8' });
      const present = new Set<string>();
      for (const line of splitLines(content)) {
        const stripped = line.trim();
        present.add(stripped);
        if (isCommentLine(stripped)) {
          present.add(stripped.replace(/^#+/, '').trim());
        }
      }

      const extra = new Set<string>();
      for (const pkg of pkgs) {
        if (!present.has(pkg)) {
          extra.add(pkg);
        }
      }

      if (extra.size > 0) {
        const needsNewline = content.length > 0 && !content.endsWith('\n');
        const appended = [...extra].map(pkg => `${pkg}\n`).join('');
        await handle.appendFile(`${needsNewline ? '\n' : ''}${appended}`, { encoding: 'utf8' });
        logger.debug(`Merged packages into set '${this.name}'`, { added: extra });
      }

      return extra;
    } catch (error) {
      if (error instanceof FileSystemError) {
        throw error;
      }
      throw new FileSystemError(`Failed to merge into set file: ${this.filePath}`, { setName: this.name, error });
    } finally {
      await handle.close();
    }
  }

  /**
   * Drop every member line whose package is in `pkgs`. Comment lines are kept.
   */
  async remove(pkgs: Iterable<string>): Promise<boolean> {
    const targets = new Set(pkgs);
    if (targets.size === 0) {
      return false;
    }
    return rewriteLines(this.filePath, line => {
      const member = parseMemberLine(line);
      return member !== null && targets.has(member) ? null : line;
    });
  }

  /**
   * Rename member `oldName` to `newName`. Substring matches and comments are untouched.
   */
  async replace(oldName: string, newName: string): Promise<boolean> {
    return rewriteLines(this.filePath, line => (parseMemberLine(line) === oldName ? newName : line));
  }

  async installed(): Promise<boolean> {
    return entryExists(this.markerPath);
  }

  async markInstalled(): Promise<void> {
    if (await this.installed()) {
      return;
    }
    await ensureDir(this.dirs.installedSets);
    try {
      await fs.writeFile(this.markerPath, '', { encoding: 'utf8', flag: 'wx' });
      logger.debug(`Marked set '${this.name}' installed`);
    } catch (error) {
      throw new FileSystemError(`Failed to create installed marker: ${this.markerPath}`, { setName: this.name, error });
    }
  }

  async markUninstalled(): Promise<void> {
    await removeFile(this.markerPath);
    logger.debug(`Marked set '${this.name}' uninstalled`);
  }
}
