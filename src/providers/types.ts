import type { Language, Plan } from '../core/plan.js';
import type { ProjectSnapshot } from '../core/snapshot.js';

export interface LanguageProvider {
  name: string;
  language: Language;
  /** Pure check against the snapshot; providers never see each other's output. */
  matches(snapshot: ProjectSnapshot): boolean;
  defaultPlan(snapshot: ProjectSnapshot): Plan;
}

export interface ProviderRegistry {
  /** Providers in priority order; the first match wins. */
  readonly providers: readonly LanguageProvider[];
  get(name: string): LanguageProvider | undefined;
}

