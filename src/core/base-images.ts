import { GenerationError } from '../utils/errors.js';
import type { Language, Plan } from './plan.js';

interface RuntimeImage {
  repository: string;
  tagSuffix: string;
  defaultTag: string;
  /** Version components kept when normalizing: 1 for node majors, 2 elsewhere. */
  precision: 1 | 2;
  supported: readonly string[];
}

const RUNTIME_IMAGES: Record<Exclude<Language, 'static'>, RuntimeImage> = {
  node: {
    repository: 'node',
    tagSuffix: '-slim',
    defaultTag: '22',
    precision: 1,
    supported: ['18', '20', '22', '24'],
  },
  python: {
    repository: 'python',
    tagSuffix: '-slim',
    defaultTag: '3.12',
    precision: 2,
    supported: ['3.9', '3.10', '3.11', '3.12', '3.13'],
  },
  go: {
    repository: 'golang',
    tagSuffix: '',
    defaultTag: '1.23',
    precision: 2,
    supported: ['1.21', '1.22', '1.23', '1.24'],
  },
  rust: {
    repository: 'rust',
    tagSuffix: '-slim',
    defaultTag: '1',
    precision: 2,
    supported: [
      '1.75', '1.76', '1.77', '1.78', '1.79', '1.80',
      '1.81', '1.82', '1.83', '1.84', '1.85', '1.86',
    ],
  },
};

export const STATIC_BUILDER_IMAGE = 'debian:bookworm-slim';
export const BUN_IMAGE = 'oven/bun:1';

/**
 * Reduce a declared version (`v20.11.1`, `>=3.11`, `^20`, `1.22.3`) to the
 * precision the image tags use. Undefined when it holds no number.
 */
export function normalizeVersion(raw: string, precision: 1 | 2): string | undefined {
  const match = /(\d+)(?:\.(\d+))?/.exec(raw);
  if (!match) return undefined;
  if (precision === 1 || match[2] === undefined) return match[1];
  return `${match[1]}.${match[2]}`;
}

export function selectBaseImage(plan: Plan): string {
  if (plan.baseImage) return plan.baseImage;

  const language = plan.language;
  if (language === undefined) {
    throw new GenerationError(
      'UnsupportedRuntimeVersion',
      'Plan has no language; set "language" or "baseImage" in the plan file.',
    );
  }
  if (language === 'static') return STATIC_BUILDER_IMAGE;
  if (language === 'node' && plan.packageManager === 'bun') return BUN_IMAGE;

  const runtime = RUNTIME_IMAGES[language];
  if (plan.runtimeVersion === undefined) {
    return `${runtime.repository}:${runtime.defaultTag}${runtime.tagSuffix}`;
  }

  const version = normalizeVersion(plan.runtimeVersion, runtime.precision);
  if (version === undefined || !runtime.supported.includes(version)) {
    throw new GenerationError(
      'UnsupportedRuntimeVersion',
      `Unsupported ${language} version "${plan.runtimeVersion}". Supported: ${runtime.supported.join(', ')}.`,
    );
  }
  return `${runtime.repository}:${version}${runtime.tagSuffix}`;
}
