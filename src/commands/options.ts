import { Option } from 'commander';
import type { Command } from 'commander';

import { parseBuildEnvArgs, parsePackageList } from '../core/overlay.js';
import type { PlanOverride } from '../core/overlay.js';
import { STATIC_SERVERS, isStaticServer } from '../core/plan.js';

export interface OverrideFlags {
  plan?: string;
  installCmd?: string;
  buildCmd?: string;
  startCmd?: string;
  runtimeVersion?: string;
  baseImage?: string;
  staticServer?: string;
  outputDir?: string;
  packages?: string[];
  buildEnv?: string[];
}

/** Which SPA flags appeared on the command line, independent of their order. */
export interface SpaSignals {
  enable: boolean;
  disable: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function collectPackages(value: string, previous: string[]): string[] {
  return [...previous, ...parsePackageList(value)];
}

export function addOverrideOptions(cmd: Command): Command {
  return cmd
    .option('--plan <file>', 'Use a plan file instead of detection (e.g. dockplan.json)')
    .option('-i, --install-cmd <command>', 'Override install command')
    .option('-b, --build-cmd <command>', 'Override build command')
    .option('-s, --start-cmd <command>', 'Override start command')
    .option('--runtime-version <version>', 'Override the runtime version (e.g. 20, 3.12)')
    .option('--base-image <image>', 'Override the base image (e.g. node:20-bookworm)')
    .addOption(
      new Option('--static-server <server>', 'Static file server').choices([...STATIC_SERVERS]),
    )
    .option('--output-dir <dir>', 'Override static output directory (e.g. dist, build, out)')
    .option('--spa', 'Enable SPA mode (serve index.html for unknown routes)')
    .option('--no-spa', 'Disable SPA mode (wins over --spa and auto-detection)')
    .option('--packages <pkg>', 'Additional APT packages (repeatable, comma-separated)', collectPackages, [])
    .option('--build-env <KEY=value>', 'Build-time variable; a bare KEY copies it from the environment', collect, []);
}

/**
 * commander folds --spa and --no-spa into one last-wins value. Listening to
 * the option events keeps both signals so a disable can beat an enable given
 * after it.
 */
export function trackSpaSignals(cmd: Command): SpaSignals {
  const signals: SpaSignals = { enable: false, disable: false };
  cmd.on('option:spa', () => {
    signals.enable = true;
  });
  cmd.on('option:no-spa', () => {
    signals.disable = true;
  });
  return signals;
}

export function toPlanOverride(
  flags: OverrideFlags,
  signals: SpaSignals,
  env: NodeJS.ProcessEnv = process.env,
): PlanOverride {
  const override: PlanOverride = {};
  const installCommand = flags.installCmd?.trim();
  if (installCommand) override.installCommand = installCommand;
  const buildCommand = flags.buildCmd?.trim();
  if (buildCommand) override.buildCommand = buildCommand;
  const startCommand = flags.startCmd?.trim();
  if (startCommand) override.startCommand = startCommand;
  const runtimeVersion = flags.runtimeVersion?.trim();
  if (runtimeVersion) override.runtimeVersion = runtimeVersion;
  const baseImage = flags.baseImage?.trim();
  if (baseImage) override.baseImage = baseImage;
  if (flags.staticServer && isStaticServer(flags.staticServer)) {
    override.staticServer = flags.staticServer;
  }
  const outputDir = flags.outputDir?.trim();
  if (outputDir) override.outputDir = outputDir;
  if (signals.enable) override.spa = true;
  if (signals.disable) override.noSpa = true;
  if (flags.packages && flags.packages.length > 0) override.packages = flags.packages;

  const buildEnv = parseBuildEnvArgs(flags.buildEnv ?? [], env);
  if (Object.keys(buildEnv).length > 0) override.buildEnv = buildEnv;
  return override;
}
