import { Command, Option } from 'commander';

import { addOverrideOptions, toPlanOverride, trackSpaSignals } from './commands/options.js';
import type { OverrideFlags } from './commands/options.js';
import type { PlanFileFormat } from './core/plan-file.js';
import { getPackageInfo } from './utils/package-info.js';

const formatOption = (): Option =>
  new Option('--format <format>', 'Plan file format').choices(['json', 'yaml']);

function isPlanFileFormat(value: string | undefined): value is PlanFileFormat {
  return value === 'json' || value === 'yaml';
}

export function createProgram(): Command {
  const pkg = getPackageInfo();

  const program = new Command()
    .name('dockplan')
    .description(pkg.description)
    .version(pkg.version);

  const prepare = addOverrideOptions(
    program
      .command('prepare')
      .description('Detect the application and generate .dockplan/Dockerfile')
      .argument('[path]', 'Path to the application', '.'),
  ).option('--dry-run', 'Print the Dockerfile instead of writing it');
  const prepareSpa = trackSpaSignals(prepare);
  prepare.action(async (path: string, options: OverrideFlags & { dryRun?: boolean }) => {
    const { prepareCommand } = await import('./commands/prepare.js');
    await prepareCommand({
      path,
      planFile: options.plan,
      overrides: toPlanOverride(options, prepareSpa),
      dryRun: options.dryRun,
    });
  });

  const plan = addOverrideOptions(
    program
      .command('plan')
      .description('Print the resolved build plan')
      .argument('[path]', 'Path to the application', '.'),
  ).addOption(formatOption().default('json'));
  const planSpa = trackSpaSignals(plan);
  plan.action(async (path: string, options: OverrideFlags & { format?: string }) => {
    const { planCommand } = await import('./commands/plan.js');
    await planCommand({
      path,
      planFile: options.plan,
      overrides: toPlanOverride(options, planSpa),
      format: isPlanFileFormat(options.format) ? options.format : 'json',
    });
  });

  program
    .command('detect')
    .description('Show which provider matches and the plan it detects')
    .argument('[path]', 'Path to the application', '.')
    .action(async (path: string) => {
      const { detectCommand } = await import('./commands/detect.js');
      await detectCommand({ path });
    });

  program
    .command('init')
    .description('Create a dockplan.json plan file from detection, interactively')
    .argument('[path]', 'Path to the application', '.')
    .addOption(formatOption())
    .action(async (path: string, options: { format?: string }) => {
      const { initCommand } = await import('./commands/init.js');
      await initCommand({
        path,
        format: isPlanFileFormat(options.format) ? options.format : undefined,
      });
    });

  return program;
}

export const program = createProgram();
