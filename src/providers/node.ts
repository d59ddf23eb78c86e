import { createPlan } from '../core/plan.js';
import type { Plan, PlanMetadata } from '../core/plan.js';
import type { ProjectSnapshot } from '../core/snapshot.js';
import { hasDigit, readPackageJson, readVersionFile } from './manifest.js';
import type { PackageJson } from './manifest.js';
import { detectNodeFramework } from './node-frameworks.js';
import type { LanguageProvider } from './types.js';

export type NodePackageManager = 'npm' | 'pnpm' | 'yarn' | 'bun';

const LOCKFILES: [string, NodePackageManager][] = [
  ['pnpm-lock.yaml', 'pnpm'],
  ['yarn.lock', 'yarn'],
  ['bun.lockb', 'bun'],
  ['bun.lock', 'bun'],
  ['package-lock.json', 'npm'],
];

const ENTRY_FILES = ['index.js', 'server.js', 'app.js', 'main.js'];

export function detectNodePackageManager(
  snapshot: ProjectSnapshot,
  pkg: PackageJson,
): NodePackageManager {
  for (const [lockfile, manager] of LOCKFILES) {
    if (snapshot.exists(lockfile)) return manager;
  }

  // "packageManager": "pnpm@9.1.0"
  const declared = pkg.packageManager?.split('@')[0];
  if (declared === 'pnpm' || declared === 'yarn' || declared === 'bun' || declared === 'npm') {
    return declared;
  }
  return 'npm';
}

export function nodeInstallCommand(manager: NodePackageManager, hasLockfile: boolean): string {
  switch (manager) {
    case 'pnpm':
      return 'pnpm install --frozen-lockfile';
    case 'yarn':
      return 'yarn install --frozen-lockfile';
    case 'bun':
      return 'bun install --frozen-lockfile';
    case 'npm':
      return hasLockfile ? 'npm ci' : 'npm install';
  }
}

function detectNodeVersion(snapshot: ProjectSnapshot, pkg: PackageJson): string | undefined {
  const fromFile = readVersionFile(snapshot, ['.nvmrc', '.node-version']);
  if (hasDigit(fromFile)) return fromFile;
  const fromEngines = pkg.engines?.node;
  return hasDigit(fromEngines) ? fromEngines : undefined;
}

function fallbackStart(snapshot: ProjectSnapshot, pkg: PackageJson): string {
  if (pkg.main && snapshot.exists(pkg.main)) return `node ${pkg.main}`;
  const entry = ENTRY_FILES.find((file) => snapshot.exists(file));
  return entry ? `node ${entry}` : '';
}

export const nodeProvider: LanguageProvider = {
  name: 'node',
  language: 'node',

  matches(snapshot) {
    return snapshot.exists('package.json');
  },

  defaultPlan(snapshot): Plan {
    const pkg = readPackageJson(snapshot);
    const scripts = pkg.scripts ?? {};
    const manager = detectNodePackageManager(snapshot, pkg);
    const hasLockfile = LOCKFILES.some(([lockfile]) => snapshot.exists(lockfile));
    const framework = detectNodeFramework(pkg);

    const metadata: PlanMetadata = {};
    let startCommand = '';

    if (framework?.outputDir) {
      metadata.outputDirOverride = framework.outputDir(pkg);
      if (framework.spa) metadata.isSpa = true;
    } else if (scripts.start) {
      startCommand = `${manager} run start`;
    } else {
      startCommand = framework?.defaultStart ?? fallbackStart(snapshot, pkg);
    }

    const plan = createPlan({
      language: 'node',
      packageManager: manager,
      installCommand: nodeInstallCommand(manager, hasLockfile),
      buildCommand: scripts.build ? `${manager} run build` : '',
      startCommand,
      metadata,
    });

    const version = detectNodeVersion(snapshot, pkg);
    if (version) plan.runtimeVersion = version;
    return plan;
  },
};
