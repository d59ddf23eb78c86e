import { readFile, readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';

/**
 * Read-only view of a project directory. Paths are POSIX-style and relative
 * to the project root; `.` and `''` both name the root.
 */
export interface ProjectSnapshot {
  exists(path: string): boolean;
  isDirectory(path: string): boolean;
  /** File contents, or null for directories, missing and oversized files. */
  read(path: string): string | null;
  /** Names of the direct children of a directory, sorted. */
  list(dir: string): string[];
}

export interface LoadSnapshotOptions {
  maxDepth?: number;
  maxFileSize?: number;
  ignore?: string[];
}

const DEFAULT_IGNORE = ['node_modules', '.git', '.dockplan', '.venv', '__pycache__', 'target'];
const DEFAULT_MAX_FILE_SIZE = 256 * 1024;

function normalizePath(path: string): string {
  const parts = path.split('/').filter((part) => part !== '' && part !== '.');
  return parts.join('/');
}

function parentOf(path: string): string {
  const idx = path.lastIndexOf('/');
  return idx === -1 ? '' : path.slice(0, idx);
}

function baseName(path: string): string {
  return path.slice(path.lastIndexOf('/') + 1);
}

export class MemorySnapshot implements ProjectSnapshot {
  private readonly files: ReadonlyMap<string, string | null>;
  private readonly children: ReadonlyMap<string, readonly string[]>;

  constructor(files: Iterable<[string, string | null]>, directories: Iterable<string> = []) {
    const fileMap = new Map<string, string | null>();
    const childMap = new Map<string, Set<string>>([['', new Set()]]);

    const addDir = (dir: string): void => {
      if (childMap.has(dir)) return;
      const parent = parentOf(dir);
      addDir(parent);
      childMap.set(dir, new Set());
      childMap.get(parent)?.add(baseName(dir));
    };

    for (const dir of directories) {
      addDir(normalizePath(dir));
    }
    for (const [rawPath, contents] of files) {
      const path = normalizePath(rawPath);
      if (path === '') continue;
      fileMap.set(path, contents);
      const parent = parentOf(path);
      addDir(parent);
      childMap.get(parent)?.add(baseName(path));
    }

    this.files = fileMap;
    this.children = new Map(
      [...childMap].map(([dir, names]) => [dir, [...names].sort()] as const),
    );
  }

  exists(path: string): boolean {
    const key = normalizePath(path);
    return this.files.has(key) || this.children.has(key);
  }

  isDirectory(path: string): boolean {
    return this.children.has(normalizePath(path));
  }

  read(path: string): string | null {
    return this.files.get(normalizePath(path)) ?? null;
  }

  list(dir: string): string[] {
    return [...(this.children.get(normalizePath(dir)) ?? [])];
  }
}

/** Build a snapshot from a `{ path: contents }` record. */
export function createSnapshot(
  files: Record<string, string>,
  directories: string[] = [],
): MemorySnapshot {
  return new MemorySnapshot(Object.entries(files), directories);
}

/**
 * Walk a directory and materialize it as a snapshot. The walk finishes
 * before anything reads from the result.
 */
export async function loadSnapshot(
  root: string,
  options?: LoadSnapshotOptions,
): Promise<MemorySnapshot> {
  const maxDepth = options?.maxDepth ?? 3;
  const maxFileSize = options?.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
  const ignore = new Set(options?.ignore ?? DEFAULT_IGNORE);

  const files: [string, string | null][] = [];
  const directories: string[] = [];

  async function walk(relDir: string, depth: number): Promise<void> {
    const entries = await readdir(join(root, relDir), { withFileTypes: true });
    for (const entry of entries) {
      if (ignore.has(entry.name)) continue;
      const relPath = relDir === '' ? entry.name : `${relDir}/${entry.name}`;

      if (entry.isDirectory()) {
        directories.push(relPath);
        if (depth < maxDepth) {
          await walk(relPath, depth + 1);
        }
      } else if (entry.isFile()) {
        const absPath = join(root, relPath);
        const info = await stat(absPath);
        files.push([relPath, info.size <= maxFileSize ? await readFile(absPath, 'utf-8') : null]);
      }
    }
  }

  await walk('', 1);
  return new MemorySnapshot(files, directories);
}
