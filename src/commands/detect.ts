import { detectCandidates, detectProvider } from '../core/detector.js';
import { isStaticPlan, resolveOutputDir } from '../core/plan.js';
import { loadSnapshot } from '../core/snapshot.js';
import { defaultRegistry } from '../providers/index.js';
import { logger } from '../ui/logger.js';
import { withSpinner } from '../ui/spinner.js';
import { resolveProjectRoot } from './prepare.js';

export interface DetectOptions {
  path?: string;
}

export async function detectCommand(options: DetectOptions): Promise<void> {
  const root = await resolveProjectRoot(options.path);
  const snapshot = await withSpinner('Reading project files...', () => loadSnapshot(root));

  const registry = defaultRegistry();
  const candidates = detectCandidates(snapshot, registry);
  const { provider, plan } = detectProvider(snapshot, registry);

  logger.header(`Detected: ${provider.name}`);
  if (candidates.length > 1) {
    logger.dim(`Also matched: ${candidates.filter((name) => name !== provider.name).join(', ')}`);
  }

  logger.field('Language', plan.language);
  logger.field('Package manager', plan.packageManager);
  logger.field('Runtime version', plan.runtimeVersion);
  logger.field('Install', plan.installCommand);
  logger.field('Build', plan.buildCommand);
  logger.field('Start', plan.startCommand);
  if (isStaticPlan(plan)) {
    logger.field('Output dir', resolveOutputDir(plan));
    logger.field('SPA', plan.metadata.isSpa ? 'yes' : 'no');
  }
}
