import { z } from 'zod';

import type { ProjectSnapshot } from '../core/snapshot.js';

const stringRecord = z.record(z.string()).optional().catch(undefined);

// Fields that fail validation are dropped, not fatal: a half-broken
// package.json still identifies a Node project.
const packageJsonSchema = z.object({
  name: z.string().optional().catch(undefined),
  main: z.string().optional().catch(undefined),
  packageManager: z.string().optional().catch(undefined),
  scripts: stringRecord,
  dependencies: stringRecord,
  devDependencies: stringRecord,
  engines: stringRecord,
});

export type PackageJson = z.infer<typeof packageJsonSchema>;

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return {};
  }
}

export function readPackageJson(snapshot: ProjectSnapshot, path = 'package.json'): PackageJson {
  const raw = snapshot.read(path);
  if (raw === null) return {};
  const parsed = packageJsonSchema.safeParse(parseJson(raw));
  return parsed.success ? parsed.data : {};
}

/** First non-empty, non-comment line of the first file that exists. */
export function readVersionFile(snapshot: ProjectSnapshot, paths: string[]): string | undefined {
  for (const path of paths) {
    const raw = snapshot.read(path);
    if (raw === null) continue;
    const line = raw
      .split('\n')
      .map((l) => l.trim())
      .find((l) => l !== '' && !l.startsWith('#'));
    if (line) return line;
  }
  return undefined;
}

/** First capture group of `pattern` in the file, if the file exists and matches. */
export function matchInFile(
  snapshot: ProjectSnapshot,
  path: string,
  pattern: RegExp,
): string | undefined {
  const raw = snapshot.read(path);
  if (raw === null) return undefined;
  return pattern.exec(raw)?.[1];
}

export function hasDigit(value: string | undefined): value is string {
  return value !== undefined && /\d/.test(value);
}
