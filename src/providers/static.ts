import { createPlan } from '../core/plan.js';
import type { Plan } from '../core/plan.js';
import type { LanguageProvider } from './types.js';

export const staticProvider: LanguageProvider = {
  name: 'static',
  language: 'static',

  matches(snapshot) {
    return snapshot.exists('index.html') || snapshot.exists('public/index.html');
  },

  defaultPlan(snapshot): Plan {
    const plan = createPlan({ language: 'static' });
    if (!snapshot.exists('index.html')) {
      plan.metadata.outputDirOverride = 'public';
    }
    return plan;
  },
};
