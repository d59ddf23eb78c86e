import { resolve } from 'node:path';

import { defaultRegistry } from '../providers/index.js';
import type { ProviderRegistry } from '../providers/types.js';
import { detectProvider } from './detector.js';
import { readEnvOverrides } from './env-overrides.js';
import { generateDockerfile } from './generator.js';
import { resolvePlan } from './overlay.js';
import type { PlanOverride } from './overlay.js';
import { findPlanFile, loadPlanFile } from './plan-file.js';
import { validatePlan } from './plan.js';
import type { Plan } from './plan.js';
import { loadSnapshot } from './snapshot.js';
import type { ProjectSnapshot } from './snapshot.js';

export type PlanSource =
  | { kind: 'plan-file'; path: string }
  | { kind: 'detection'; provider: string };

export interface ResolveOptions {
  /** Explicit plan file; otherwise dockplan.json/.yaml/.yml in the root is used if present. */
  planFile?: string;
  cli?: PlanOverride;
  env?: NodeJS.ProcessEnv;
  registry?: ProviderRegistry;
  /** Pre-loaded snapshot; skips reading the directory. */
  snapshot?: ProjectSnapshot;
}

export interface ResolvedProject {
  source: PlanSource;
  plan: Plan;
}

/**
 * Base plan for a project: the plan file when one is given or found,
 * detection otherwise. A plan file that fails to parse stops here, before
 * detection is attempted.
 */
export async function loadBasePlan(
  root: string,
  options: Pick<ResolveOptions, 'planFile' | 'registry' | 'snapshot'> = {},
): Promise<ResolvedProject> {
  const planFile = options.planFile ? resolve(root, options.planFile) : await findPlanFile(root);
  if (planFile) {
    return { source: { kind: 'plan-file', path: planFile }, plan: await loadPlanFile(planFile) };
  }

  const snapshot = options.snapshot ?? (await loadSnapshot(root));
  const { provider, plan } = detectProvider(snapshot, options.registry ?? defaultRegistry());
  return { source: { kind: 'detection', provider: provider.name }, plan };
}

export async function resolveProjectPlan(
  root: string,
  options: ResolveOptions = {},
): Promise<ResolvedProject> {
  const env = readEnvOverrides(options.env ?? process.env);
  const base = await loadBasePlan(root, options);
  const plan = validatePlan(resolvePlan(base.plan, { env, cli: options.cli }));
  return { source: base.source, plan };
}

export async function prepareDockerfile(
  root: string,
  options: ResolveOptions = {},
): Promise<ResolvedProject & { dockerfile: string }> {
  const resolved = await resolveProjectPlan(root, options);
  return { ...resolved, dockerfile: generateDockerfile(resolved.plan) };
}
