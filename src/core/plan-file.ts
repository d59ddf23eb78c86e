import { readFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';

import { fileExists } from '../utils/fs.js';
import { PlanFileError } from '../utils/errors.js';
import { parsePlan, serializePlan } from './plan.js';
import type { Plan } from './plan.js';

export type PlanFileFormat = 'json' | 'yaml';

export const PLAN_FILENAMES = ['dockplan.json', 'dockplan.yaml', 'dockplan.yml'];

export function planFileFormat(path: string): PlanFileFormat {
  const ext = extname(path).toLowerCase();
  return ext === '.yaml' || ext === '.yml' ? 'yaml' : 'json';
}

/** The first plan file present in the project root, if any. */
export async function findPlanFile(root: string): Promise<string | null> {
  for (const name of PLAN_FILENAMES) {
    const candidate = join(root, name);
    if (await fileExists(candidate)) return candidate;
  }
  return null;
}

export function parsePlanFile(content: string, format: PlanFileFormat, source: string): Plan {
  let raw: unknown;
  try {
    raw = format === 'yaml' ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PlanFileError(source, `failed to parse ${format.toUpperCase()}: ${reason}`);
  }
  return parsePlan(raw, source);
}

export async function loadPlanFile(path: string): Promise<Plan> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PlanFileError(path, `failed to read file: ${reason}`);
  }
  return parsePlanFile(content, planFileFormat(path), path);
}

export function formatPlanFile(plan: Plan, format: PlanFileFormat): string {
  const serialized = serializePlan(plan);
  if (format === 'yaml') {
    return stringifyYaml(serialized, { lineWidth: 0 });
  }
  return JSON.stringify(serialized, null, 2) + '\n';
}
