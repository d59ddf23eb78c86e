import { createPlan } from '../core/plan.js';
import type { Plan } from '../core/plan.js';
import type { ProjectSnapshot } from '../core/snapshot.js';
import { hasDigit, matchInFile, readVersionFile } from './manifest.js';
import type { LanguageProvider } from './types.js';

/** `name` under the `[package]` table of Cargo.toml. */
export function readCrateName(snapshot: ProjectSnapshot): string | undefined {
  const manifest = snapshot.read('Cargo.toml');
  if (manifest === null) return undefined;
  const section = /^\[package\]\s*$([\s\S]*?)(?=^\[|(?![\s\S]))/m.exec(manifest)?.[1] ?? '';
  return /^name\s*=\s*"([^"]+)"/m.exec(section)?.[1];
}

function detectRustVersion(snapshot: ProjectSnapshot): string | undefined {
  const channel = matchInFile(snapshot, 'rust-toolchain.toml', /^channel\s*=\s*"([^"]+)"/m);
  if (hasDigit(channel)) return channel;
  const legacy = readVersionFile(snapshot, ['rust-toolchain']);
  return hasDigit(legacy) ? legacy : undefined;
}

export const rustProvider: LanguageProvider = {
  name: 'rust',
  language: 'rust',

  matches(snapshot) {
    return snapshot.exists('Cargo.toml');
  },

  defaultPlan(snapshot): Plan {
    const crate = readCrateName(snapshot);
    const plan = createPlan({
      language: 'rust',
      packageManager: 'cargo',
      installCommand: 'cargo fetch',
      buildCommand: 'cargo build --release',
      startCommand: crate ? `./target/release/${crate}` : '',
    });

    const version = detectRustVersion(snapshot);
    if (version) plan.runtimeVersion = version;
    return plan;
  },
};
