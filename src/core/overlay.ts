import { createPlan, uniquePackages } from './plan.js';
import type { Plan, PlanMetadata, StaticServer } from './plan.js';

/** One layer of user-supplied overrides, already normalized by its source. */
export interface PlanOverride {
  installCommand?: string;
  buildCommand?: string;
  startCommand?: string;
  runtimeVersion?: string;
  baseImage?: string;
  staticServer?: StaticServer;
  outputDir?: string;
  spa?: boolean;
  noSpa?: boolean;
  packages?: readonly string[];
  buildEnv?: Readonly<Record<string, string>>;
}

export interface OverrideLayers {
  env?: PlanOverride;
  cli?: PlanOverride;
}

function pick(prior: string, next: string | undefined): string {
  return next !== undefined && next !== '' ? next : prior;
}

function pickOptional(prior: string | undefined, next: string | undefined): string | undefined {
  return next !== undefined && next !== '' ? next : prior;
}

/**
 * Apply one override layer. Returns a new plan; the input is left untouched.
 *
 * Scalars: a non-empty value wins. SPA: a disable signal removes the flag and
 * beats an enable in the same layer. Packages: appended, then deduplicated.
 * buildEnv: a non-empty mapping replaces the whole prior set.
 */
export function overlay(plan: Plan, override: PlanOverride): Plan {
  const metadata: PlanMetadata = { ...plan.metadata };

  if (override.staticServer) metadata.staticServer = override.staticServer;
  const outputDir = override.outputDir?.trim();
  if (outputDir) metadata.outputDirOverride = outputDir;

  if (override.noSpa) {
    delete metadata.isSpa;
  } else if (override.spa) {
    metadata.isSpa = true;
  }

  if (override.packages && override.packages.length > 0) {
    metadata.customPackages = uniquePackages([
      ...(metadata.customPackages ?? []),
      ...override.packages,
    ]);
  }

  const buildEnv =
    override.buildEnv && Object.keys(override.buildEnv).length > 0
      ? override.buildEnv
      : plan.buildEnv;

  const next = createPlan({
    ...plan,
    installCommand: pick(plan.installCommand, override.installCommand),
    buildCommand: pick(plan.buildCommand, override.buildCommand),
    startCommand: pick(plan.startCommand, override.startCommand),
    buildEnv,
    metadata,
  });

  const runtimeVersion = pickOptional(plan.runtimeVersion, override.runtimeVersion);
  if (runtimeVersion !== undefined) next.runtimeVersion = runtimeVersion;
  const baseImage = pickOptional(plan.baseImage, override.baseImage);
  if (baseImage !== undefined) next.baseImage = baseImage;
  return next;
}

/**
 * Resolve the base plan against the environment layer, then the CLI layer.
 * Packages union in the order prior, CLI, environment, so the environment
 * layer's packages go on last as a layer of their own.
 */
export function resolvePlan(base: Plan, layers: OverrideLayers = {}): Plan {
  const { packages: envPackages, ...envRest } = layers.env ?? {};

  let plan = overlay(base, envRest);
  if (layers.cli) plan = overlay(plan, layers.cli);
  if (envPackages) plan = overlay(plan, { packages: envPackages });
  return plan;
}

/** Comma-separated package list; entries trimmed, empties dropped. */
export function parsePackageList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((pkg) => pkg.trim())
    .filter(Boolean);
}

/**
 * `KEY=value` pairs. A bare `KEY` takes its value from `env`, and is skipped
 * when `env` does not define it.
 */
export function parseBuildEnvArgs(
  args: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    const idx = arg.indexOf('=');
    if (idx !== -1) {
      result[arg.slice(0, idx)] = arg.slice(idx + 1);
      continue;
    }
    const value = env[arg];
    if (value !== undefined) {
      result[arg] = value;
    }
  }
  return result;
}
