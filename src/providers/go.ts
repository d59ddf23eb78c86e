import { createPlan } from '../core/plan.js';
import type { Plan } from '../core/plan.js';
import type { ProjectSnapshot } from '../core/snapshot.js';
import { matchInFile } from './manifest.js';
import type { LanguageProvider } from './types.js';

const BINARY = 'server';

/** Package to build: the root when it holds main.go, else the first cmd/<name>. */
export function findGoMainPackage(snapshot: ProjectSnapshot): string | undefined {
  if (snapshot.exists('main.go')) return '.';
  const command = snapshot
    .list('cmd')
    .find((name) => snapshot.exists(`cmd/${name}/main.go`));
  return command ? `./cmd/${command}` : undefined;
}

export const goProvider: LanguageProvider = {
  name: 'go',
  language: 'go',

  matches(snapshot) {
    return snapshot.exists('go.mod');
  },

  defaultPlan(snapshot): Plan {
    const mainPackage = findGoMainPackage(snapshot);
    const plan = createPlan({
      language: 'go',
      packageManager: 'go',
      installCommand: 'go mod download',
      buildCommand: mainPackage ? `CGO_ENABLED=0 go build -o ${BINARY} ${mainPackage}` : '',
      startCommand: mainPackage ? `./${BINARY}` : '',
    });

    const version = matchInFile(snapshot, 'go.mod', /^go\s+(\d+\.\d+(?:\.\d+)?)\s*$/m);
    if (version) plan.runtimeVersion = version;
    return plan;
  },
};
