import { formatPlanFile } from '../core/plan-file.js';
import type { PlanFileFormat } from '../core/plan-file.js';
import { resolveProjectPlan } from '../core/pipeline.js';
import type { PlanOverride } from '../core/overlay.js';
import { logger } from '../ui/logger.js';
import { describeSource, resolveProjectRoot } from './prepare.js';

export interface PlanOptions {
  path?: string;
  planFile?: string;
  overrides: PlanOverride;
  format: PlanFileFormat;
  env?: NodeJS.ProcessEnv;
}

/** Print the resolved plan, in plan-file format, to stdout. */
export async function planCommand(options: PlanOptions): Promise<void> {
  const root = await resolveProjectRoot(options.path);
  const { source, plan } = await resolveProjectPlan(root, {
    planFile: options.planFile,
    cli: options.overrides,
    env: options.env,
  });

  logger.debug(describeSource(source, root));
  process.stdout.write(formatPlanFile(plan, options.format));
}
