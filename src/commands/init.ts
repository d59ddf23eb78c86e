import { join, relative } from 'node:path';

import { detectProvider } from '../core/detector.js';
import { FileWriter } from '../core/file-writer.js';
import { findPlanFile, formatPlanFile, planFileFormat } from '../core/plan-file.js';
import type { PlanFileFormat } from '../core/plan-file.js';
import {
  DEFAULT_STATIC_SERVER,
  LANGUAGES,
  createPlan,
  isStaticPlan,
  validatePlan,
} from '../core/plan.js';
import type { Language, Plan, StaticServer } from '../core/plan.js';
import { loadSnapshot } from '../core/snapshot.js';
import { defaultRegistry } from '../providers/index.js';
import { logger } from '../ui/logger.js';
import { confirmPrompt, inputPrompt, selectPrompt } from '../ui/prompts.js';
import { withSpinner } from '../ui/spinner.js';
import { DetectionError } from '../utils/errors.js';
import { resolveProjectRoot } from './prepare.js';

export interface InitOptions {
  path?: string;
  format?: PlanFileFormat;
}

async function detectOrEmpty(root: string): Promise<Plan> {
  const snapshot = await withSpinner('Reading project files...', () => loadSnapshot(root));
  try {
    const { provider, plan } = detectProvider(snapshot, defaultRegistry());
    logger.info(`Detected ${provider.name} application`);
    return plan;
  } catch (error) {
    if (!(error instanceof DetectionError)) throw error;
    logger.warn('No supported application detected. Starting from an empty plan.');
    return createPlan();
  }
}

async function askCommand(label: string, detected: string): Promise<string> {
  const answer = await inputPrompt(`${label} command (leave empty to skip):`, detected || undefined);
  return answer.trim();
}

/** Write a plan file seeded from detection, confirmed step by step. */
export async function initCommand(options: InitOptions): Promise<void> {
  const root = await resolveProjectRoot(options.path);

  logger.header('dockplan - plan file setup');

  const existing = await findPlanFile(root);
  if (existing) {
    logger.warn(`A plan file already exists: ${relative(root, existing)}`);
    const overwrite = await confirmPrompt('Do you want to overwrite it?', false);
    if (!overwrite) {
      logger.info('Init cancelled. Existing plan file preserved.');
      return;
    }
  }

  const detected = await detectOrEmpty(root);
  if (!detected.language) {
    detected.language = await selectPrompt<Language>(
      'Language:',
      LANGUAGES.map((language) => ({ name: language, value: language })),
    );
  }

  const plan = createPlan({
    ...detected,
    installCommand: await askCommand('Install', detected.installCommand),
    buildCommand: await askCommand('Build', detected.buildCommand),
    startCommand: await askCommand('Start', detected.startCommand),
  });

  if (plan.startCommand === '' && isStaticPlan(plan)) {
    plan.metadata.staticServer = await selectPrompt<StaticServer>(
      'Static file server:',
      [
        { name: 'Caddy', value: 'caddy' },
        { name: 'nginx', value: 'nginx' },
      ],
      detected.metadata.staticServer ?? DEFAULT_STATIC_SERVER,
    );
  }

  validatePlan(plan);

  const target =
    existing ?? join(root, options.format === 'yaml' ? 'dockplan.yaml' : 'dockplan.json');
  const outcome = await new FileWriter().write(target, formatPlanFile(plan, planFileFormat(target)));
  logger.fileWritten(relative(root, target), outcome);
  logger.dim('Run "dockplan prepare" to generate the Dockerfile from this plan.');
}
