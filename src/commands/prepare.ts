import { join, relative, resolve } from 'node:path';

import { FileWriter } from '../core/file-writer.js';
import { prepareDockerfile } from '../core/pipeline.js';
import type { PlanSource } from '../core/pipeline.js';
import type { PlanOverride } from '../core/overlay.js';
import { logger } from '../ui/logger.js';
import { withSpinner } from '../ui/spinner.js';
import { ProjectNotFoundError } from '../utils/errors.js';
import { isDirectory } from '../utils/fs.js';

export const OUTPUT_DIR = '.dockplan';
export const DOCKERFILE_NAME = 'Dockerfile';

export interface PrepareOptions {
  path?: string;
  planFile?: string;
  overrides: PlanOverride;
  dryRun?: boolean;
  env?: NodeJS.ProcessEnv;
}

export async function resolveProjectRoot(path: string | undefined): Promise<string> {
  const root = resolve(path ?? '.');
  if (!(await isDirectory(root))) {
    throw new ProjectNotFoundError(root);
  }
  return root;
}

export function describeSource(source: PlanSource, root: string): string {
  if (source.kind === 'plan-file') {
    return `Using plan file: ${relative(root, source.path) || source.path}`;
  }
  return `Detected ${source.provider} application`;
}

export async function prepareCommand(options: PrepareOptions): Promise<void> {
  const root = await resolveProjectRoot(options.path);

  const result = await withSpinner('Analyzing project...', () =>
    prepareDockerfile(root, {
      planFile: options.planFile,
      cli: options.overrides,
      env: options.env,
    }),
  );

  logger.info(describeSource(result.source, root));

  if (options.dryRun) {
    process.stdout.write(result.dockerfile);
    return;
  }

  const target = join(root, OUTPUT_DIR, DOCKERFILE_NAME);
  const outcome = await new FileWriter().write(target, result.dockerfile);
  logger.success(`Generated files in ${join(root, OUTPUT_DIR)}`);
  logger.fileWritten(relative(root, target), outcome);
}
