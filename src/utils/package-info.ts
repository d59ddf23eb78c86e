import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

export interface PackageInfo {
  name: string;
  version: string;
  description: string;
}

const packageInfoSchema = z.object({
  name: z.string().default('dockplan'),
  version: z.string(),
  description: z.string().default(''),
});

function readPackageInfo(dir: string): PackageInfo | null {
  let content: string;
  try {
    content = readFileSync(join(dir, 'package.json'), 'utf-8');
  } catch {
    return null;
  }
  const parsed = packageInfoSchema.safeParse(JSON.parse(content));
  return parsed.success ? parsed.data : null;
}

/**
 * Find our own package.json by walking up from this file, so the lookup
 * works from both src/ and dist/.
 */
export function getPackageInfo(): PackageInfo {
  let dir = dirname(fileURLToPath(import.meta.url));

  while (true) {
    const info = readPackageInfo(dir);
    if (info) return info;

    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return { name: 'dockplan', version: '0.0.0', description: '' };
}
