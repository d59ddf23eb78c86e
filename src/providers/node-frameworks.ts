import type { PackageJson } from './manifest.js';

export interface NodeFramework {
  name: string;
  /** Any one of these dependencies identifies the framework. */
  dependencies: string[];
  /** Conventional build output. Frameworks with one are served as static files. */
  outputDir?: (pkg: PackageJson) => string;
  spa?: boolean;
  /** Used when package.json has no start script. */
  defaultStart?: string;
}

// Checked top to bottom. Meta-frameworks come before the bundlers they are
// built on, so a Remix app is not mistaken for a plain Vite SPA.
export const NODE_FRAMEWORKS: readonly NodeFramework[] = [
  { name: 'next', dependencies: ['next'], defaultStart: 'npx next start' },
  { name: 'nuxt', dependencies: ['nuxt'], defaultStart: 'node .output/server/index.mjs' },
  {
    name: 'remix',
    dependencies: ['@remix-run/node', '@remix-run/serve', '@react-router/node'],
    defaultStart: 'npx remix-serve ./build/server/index.js',
  },
  { name: 'sveltekit', dependencies: ['@sveltejs/kit'], defaultStart: 'node build' },
  {
    name: 'astro-node',
    dependencies: ['@astrojs/node'],
    defaultStart: 'node ./dist/server/entry.mjs',
  },
  { name: 'astro', dependencies: ['astro'], outputDir: () => 'dist' },
  { name: 'gatsby', dependencies: ['gatsby'], outputDir: () => 'public' },
  { name: 'docusaurus', dependencies: ['@docusaurus/core'], outputDir: () => 'build' },
  {
    name: 'angular',
    dependencies: ['@angular/core'],
    outputDir: (pkg) => `dist/${pkg.name ?? 'app'}/browser`,
    spa: true,
  },
  { name: 'create-react-app', dependencies: ['react-scripts'], outputDir: () => 'build', spa: true },
  { name: 'vue-cli', dependencies: ['@vue/cli-service'], outputDir: () => 'dist', spa: true },
  { name: 'vite', dependencies: ['vite'], outputDir: () => 'dist', spa: true },
];

export function detectNodeFramework(pkg: PackageJson): NodeFramework | undefined {
  const deps = { ...(pkg.dependencies ?? {}), ...(pkg.devDependencies ?? {}) };
  return NODE_FRAMEWORKS.find((framework) =>
    framework.dependencies.some((dep) => Object.prototype.hasOwnProperty.call(deps, dep)),
  );
}
