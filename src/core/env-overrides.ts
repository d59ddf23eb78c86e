import { z } from 'zod';

import { ConfigError } from '../utils/errors.js';
import { STATIC_SERVERS } from './plan.js';
import { parsePackageList } from './overlay.js';
import type { PlanOverride } from './overlay.js';

export const ENV_PREFIX = 'DOCKPLAN_';

const optionalString = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const flag = z
  .string()
  .optional()
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  DOCKPLAN_INSTALL_CMD: optionalString,
  DOCKPLAN_BUILD_CMD: optionalString,
  DOCKPLAN_START_CMD: optionalString,
  DOCKPLAN_BASE_IMAGE: optionalString,
  DOCKPLAN_RUNTIME_VERSION: optionalString,
  DOCKPLAN_STATIC_SERVER: optionalString.pipe(z.enum(STATIC_SERVERS).optional()),
  DOCKPLAN_OUTPUT_DIR: optionalString,
  DOCKPLAN_SPA: flag,
  DOCKPLAN_NO_SPA: flag,
  DOCKPLAN_PACKAGES: z.string().optional(),
});

/** Read the environment-variable override layer. */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): PlanOverride {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(String(issue?.path[0] ?? ENV_PREFIX), issue?.message ?? 'invalid value');
  }

  const vars = parsed.data;
  const override: PlanOverride = {};
  if (vars.DOCKPLAN_INSTALL_CMD) override.installCommand = vars.DOCKPLAN_INSTALL_CMD;
  if (vars.DOCKPLAN_BUILD_CMD) override.buildCommand = vars.DOCKPLAN_BUILD_CMD;
  if (vars.DOCKPLAN_START_CMD) override.startCommand = vars.DOCKPLAN_START_CMD;
  if (vars.DOCKPLAN_BASE_IMAGE) override.baseImage = vars.DOCKPLAN_BASE_IMAGE;
  if (vars.DOCKPLAN_RUNTIME_VERSION) override.runtimeVersion = vars.DOCKPLAN_RUNTIME_VERSION;
  if (vars.DOCKPLAN_STATIC_SERVER) override.staticServer = vars.DOCKPLAN_STATIC_SERVER;
  if (vars.DOCKPLAN_OUTPUT_DIR) override.outputDir = vars.DOCKPLAN_OUTPUT_DIR;
  if (vars.DOCKPLAN_SPA) override.spa = true;
  if (vars.DOCKPLAN_NO_SPA) override.noSpa = true;

  const packages = parsePackageList(vars.DOCKPLAN_PACKAGES);
  if (packages.length > 0) override.packages = packages;
  return override;
}
