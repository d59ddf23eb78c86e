import { ProviderRegistryError } from '../utils/errors.js';
import type { LanguageProvider, ProviderRegistry } from './types.js';

import { nodeProvider } from './node.js';
import { pythonProvider } from './python.js';
import { goProvider } from './go.js';
import { rustProvider } from './rust.js';
import { staticProvider } from './static.js';

// Order is part of the contract: language recognizers with a manifest first,
// the bare-HTML fallback last.
const builtinProviders: LanguageProvider[] = [
  nodeProvider,
  pythonProvider,
  goProvider,
  rustProvider,
  staticProvider,
];

export function createRegistry(providers: readonly LanguageProvider[]): ProviderRegistry {
  const byName = new Map<string, LanguageProvider>();
  for (const provider of providers) {
    if (byName.has(provider.name)) {
      throw new ProviderRegistryError(`Provider "${provider.name}" is registered twice`);
    }
    byName.set(provider.name, provider);
  }

  const ordered = Object.freeze([...providers]);
  return Object.freeze({
    providers: ordered,
    get(name: string): LanguageProvider | undefined {
      return byName.get(name);
    },
  });
}

export function defaultRegistry(): ProviderRegistry {
  return createRegistry(builtinProviders);
}

export { type LanguageProvider, type ProviderRegistry } from './types.js';
