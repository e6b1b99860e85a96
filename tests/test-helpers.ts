import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import type { ExecutionContext, PkgsetDirectories } from '../src/types/index.js';
import type { OutputPort } from '../src/core/ports/output.js';
import type { PackageManagerPort } from '../src/core/ports/package-manager.js';
import { getPkgsetDirectories } from '../src/core/directory.js';

export interface PortCall {
  op: 'install' | 'uninstall';
  pkgs: string[];
}

/**
 * In-process package manager. Only non-empty calls are recorded, mirroring
 * a real backend that never runs a command for an empty package list.
 */
export class FakePackageManager implements PackageManagerPort {
  readonly name = 'fake';
  readonly explicit: Set<string>;
  readonly calls: PortCall[] = [];
  failInstall = false;
  failUninstall = false;
  queries = 0;

  constructor(explicit: Iterable<string> = []) {
    this.explicit = new Set(explicit);
  }

  async explicitlyInstalled(): Promise<Set<string>> {
    this.queries++;
    return new Set(this.explicit);
  }

  async install(pkgs: Iterable<string>): Promise<boolean> {
    const list = [...new Set(pkgs)].sort();
    if (list.length === 0) {
      return true;
    }
    this.calls.push({ op: 'install', pkgs: list });
    if (this.failInstall) {
      return false;
    }
    list.forEach(pkg => this.explicit.add(pkg));
    return true;
  }

  async uninstall(pkgs: Iterable<string>): Promise<boolean> {
    const list = [...new Set(pkgs)].sort();
    if (list.length === 0) {
      return true;
    }
    this.calls.push({ op: 'uninstall', pkgs: list });
    if (this.failUninstall) {
      return false;
    }
    list.forEach(pkg => this.explicit.delete(pkg));
    return true;
  }
}

export interface RecordedOutput extends OutputPort {
  lines: string[];
}

/**
 * OutputPort that records "<kind>: <message>" lines instead of printing.
 */
export function createRecordingOutput(): RecordedOutput {
  const lines: string[] = [];
  const record = (kind: string) => (message: string) => {
    lines.push(`${kind}: ${message}`);
  };
  return {
    lines,
    info: record('info'),
    step: record('step'),
    message: record('message'),
    success: record('success'),
    error: record('error'),
    warn: record('warn'),
    note: (content: string, title?: string) => {
      lines.push(`note: ${title ?? ''}\n${content}`);
    }
  };
}

export async function createTempRoot(label: string): Promise<PkgsetDirectories> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), `pkgset-${label}-`));
  const dirs = getPkgsetDirectories(root);
  await fs.mkdir(dirs.sets, { recursive: true });
  await fs.mkdir(dirs.installedSets, { recursive: true });
  return dirs;
}

export async function cleanup(dirs: PkgsetDirectories): Promise<void> {
  await fs.rm(dirs.root, { recursive: true, force: true });
}

export function createTestContext(
  dirs: PkgsetDirectories,
  packageManager: FakePackageManager,
  options: { lock?: boolean } = {}
): ExecutionContext & { output: RecordedOutput } {
  return {
    dirs,
    packageManager,
    output: createRecordingOutput(),
    lock: options.lock ?? false
  };
}

/**
 * Write a set file from raw lines and optionally create its installed marker.
 */
export async function writeSet(
  dirs: PkgsetDirectories,
  name: string,
  lines: string[],
  options: { installed?: boolean } = {}
): Promise<void> {
  await fs.writeFile(path.join(dirs.sets, name), lines.map(line => `${line}\n`).join(''), 'utf8');
  if (options.installed) {
    await fs.writeFile(path.join(dirs.installedSets, name), '', 'utf8');
  }
}

export async function readSetFile(dirs: PkgsetDirectories, name: string): Promise<string> {
  return fs.readFile(path.join(dirs.sets, name), 'utf8');
}

export async function isMarked(dirs: PkgsetDirectories, name: string): Promise<boolean> {
  return fs.lstat(path.join(dirs.installedSets, name)).then(() => true, () => false);
}
