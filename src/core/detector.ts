import { DetectionError } from '../utils/errors.js';
import type { LanguageProvider, ProviderRegistry } from '../providers/types.js';
import type { Plan } from './plan.js';
import type { ProjectSnapshot } from './snapshot.js';

export interface DetectionResult {
  provider: LanguageProvider;
  plan: Plan;
}

/**
 * Run every provider against the snapshot and keep the first match in
 * registry order. Providers are pure, so evaluation order never changes
 * which one wins.
 */
export function detectProvider(
  snapshot: ProjectSnapshot,
  registry: ProviderRegistry,
): DetectionResult {
  const matched = registry.providers.map((provider) => provider.matches(snapshot));
  const index = matched.indexOf(true);
  if (index === -1) {
    throw new DetectionError('NoApplicationDetected');
  }

  const provider = registry.providers[index];
  return { provider, plan: provider.defaultPlan(snapshot) };
}

export function detect(snapshot: ProjectSnapshot, registry: ProviderRegistry): Plan {
  return detectProvider(snapshot, registry).plan;
}

/** Names of every provider that matches, in registry order. */
export function detectCandidates(snapshot: ProjectSnapshot, registry: ProviderRegistry): string[] {
  return registry.providers
    .filter((provider) => provider.matches(snapshot))
    .map((provider) => provider.name);
}
