import { z } from 'zod';

import { PlanFileError, PlanValidationError } from '../utils/errors.js';

export const LANGUAGES = ['node', 'python', 'go', 'rust', 'static'] as const;
export type Language = (typeof LANGUAGES)[number];

export const STATIC_SERVERS = ['caddy', 'nginx'] as const;
export type StaticServer = (typeof STATIC_SERVERS)[number];

export const DEFAULT_STATIC_SERVER: StaticServer = 'caddy';

export function isStaticServer(value: string): value is StaticServer {
  return STATIC_SERVERS.some((server) => server === value);
}

export interface PlanMetadata {
  staticServer?: StaticServer;
  /** Present only while SPA mode is active. */
  isSpa?: true;
  outputDirOverride?: string;
  customPackages?: readonly string[];
}

export interface Plan {
  language?: Language;
  packageManager?: string;
  runtimeVersion?: string;
  baseImage?: string;
  installCommand: string;
  buildCommand: string;
  startCommand: string;
  buildEnv: Readonly<Record<string, string>>;
  metadata: PlanMetadata;
}

// Unknown metadata keys are stripped so newer plan files still load.
const metadataSchema = z.object({
  static_server: z.enum(STATIC_SERVERS).optional(),
  is_spa: z.boolean().optional(),
  output_dir_override: z.string().optional(),
  custom_packages: z.array(z.string()).optional(),
});

export const serializedPlanSchema = z
  .object({
    language: z.enum(LANGUAGES).or(z.literal('')).optional(),
    packageManager: z.string().optional(),
    runtimeVersion: z.string().optional(),
    baseImage: z.string().optional(),
    installCommand: z.string().default(''),
    buildCommand: z.string().default(''),
    startCommand: z.string().default(''),
    buildEnv: z.record(z.string()).default({}),
    metadata: metadataSchema.default({}),
  })
  .strict();

export type SerializedPlan = z.input<typeof serializedPlanSchema>;

const APT_PACKAGE = /^[A-Za-z0-9][A-Za-z0-9+.:=~_-]*$/;
const ENV_KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;
// Image references and paths are single words in a Dockerfile instruction.
const DOCKER_TOKEN = /^\S+$/;

export function createPlan(fields: Partial<Plan> = {}): Plan {
  return {
    installCommand: '',
    buildCommand: '',
    startCommand: '',
    ...fields,
    buildEnv: { ...(fields.buildEnv ?? {}) },
    metadata: { ...(fields.metadata ?? {}) },
  };
}

export function uniquePackages(packages: Iterable<string>): string[] {
  return [...new Set(packages)];
}

export function parsePlan(raw: unknown, source = 'plan'): Plan {
  const parsed = serializedPlanSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new PlanFileError(source, details);
  }

  const data = parsed.data;
  const metadata: PlanMetadata = {};
  if (data.metadata.static_server) metadata.staticServer = data.metadata.static_server;
  if (data.metadata.is_spa) metadata.isSpa = true;
  if (data.metadata.output_dir_override) {
    metadata.outputDirOverride = data.metadata.output_dir_override;
  }
  if (data.metadata.custom_packages && data.metadata.custom_packages.length > 0) {
    metadata.customPackages = uniquePackages(data.metadata.custom_packages);
  }

  const plan = createPlan({
    installCommand: data.installCommand,
    buildCommand: data.buildCommand,
    startCommand: data.startCommand,
    buildEnv: data.buildEnv,
    metadata,
  });
  if (data.language) plan.language = data.language;
  if (data.packageManager) plan.packageManager = data.packageManager;
  if (data.runtimeVersion) plan.runtimeVersion = data.runtimeVersion;
  if (data.baseImage) plan.baseImage = data.baseImage;
  return plan;
}

export function serializePlan(plan: Plan): SerializedPlan {
  const metadata: NonNullable<SerializedPlan['metadata']> = {};
  if (plan.metadata.staticServer) metadata.static_server = plan.metadata.staticServer;
  if (plan.metadata.isSpa) metadata.is_spa = true;
  if (plan.metadata.outputDirOverride) {
    metadata.output_dir_override = plan.metadata.outputDirOverride;
  }
  if (plan.metadata.customPackages && plan.metadata.customPackages.length > 0) {
    metadata.custom_packages = [...plan.metadata.customPackages];
  }

  const serialized: SerializedPlan = {};
  if (plan.language) serialized.language = plan.language;
  if (plan.packageManager) serialized.packageManager = plan.packageManager;
  if (plan.runtimeVersion) serialized.runtimeVersion = plan.runtimeVersion;
  if (plan.baseImage) serialized.baseImage = plan.baseImage;
  serialized.installCommand = plan.installCommand;
  serialized.buildCommand = plan.buildCommand;
  serialized.startCommand = plan.startCommand;
  serialized.buildEnv = { ...plan.buildEnv };
  serialized.metadata = metadata;
  return serialized;
}

function normalizeDir(dir: string): string {
  const trimmed = dir.trim().replace(/\/+$/, '').replace(/^\.\/+/, '');
  return trimmed === '' ? '.' : trimmed;
}

/**
 * Directory whose contents a static server should publish, relative to the
 * application root. Undefined when the plan has no static output.
 */
export function resolveOutputDir(plan: Plan): string | undefined {
  if (plan.metadata.outputDirOverride) return normalizeDir(plan.metadata.outputDirOverride);
  if (plan.language === 'static') return '.';
  if (plan.metadata.isSpa) return 'dist';
  return undefined;
}

export function isStaticPlan(plan: Plan): boolean {
  return resolveOutputDir(plan) !== undefined;
}

export function validatePlan(plan: Plan): Plan {
  const hasCommand =
    plan.installCommand !== '' || plan.buildCommand !== '' || plan.startCommand !== '';
  if (!hasCommand && plan.language !== 'static') {
    throw new PlanValidationError(
      'MissingRequiredField',
      'startCommand',
      'Plan has no install, build or start command. Set one, or use the "static" language.',
    );
  }

  const packages = plan.metadata.customPackages ?? [];
  if ((hasCommand || packages.length > 0) && !plan.language && !plan.baseImage) {
    throw new PlanValidationError(
      'MissingRequiredField',
      'language',
      'Plan has no language or base image to run its commands on. Set "language" or "baseImage".',
    );
  }

  if (plan.language === 'static' && plan.startCommand !== '') {
    throw new PlanValidationError(
      'ConflictingMetadata',
      'startCommand',
      'A static plan is served by a file server and cannot have a start command.',
    );
  }

  if (!hasCommand && packages.length > 0) {
    throw new PlanValidationError(
      'ConflictingMetadata',
      'metadata.customPackages',
      'System packages need an install, build or start command; a plan served as plain files never uses them.',
    );
  }

  if (plan.baseImage !== undefined && !DOCKER_TOKEN.test(plan.baseImage)) {
    throw new PlanValidationError(
      'InvalidValue',
      'baseImage',
      `Base image "${plan.baseImage}" must not contain whitespace.`,
    );
  }

  for (const pkg of packages) {
    if (!APT_PACKAGE.test(pkg)) {
      throw new PlanValidationError(
        'InvalidValue',
        'metadata.customPackages',
        `"${pkg}" is not a valid system package name.`,
      );
    }
  }

  for (const [key, value] of Object.entries(plan.buildEnv)) {
    if (!ENV_KEY.test(key)) {
      throw new PlanValidationError(
        'InvalidValue',
        'buildEnv',
        `"${key}" is not a valid environment variable name.`,
      );
    }
    if (/[\r\n]/.test(value)) {
      throw new PlanValidationError(
        'InvalidValue',
        'buildEnv',
        `The value of "${key}" must fit on one line.`,
      );
    }
  }

  const outputDir = plan.metadata.outputDirOverride;
  if (outputDir !== undefined) {
    if (!DOCKER_TOKEN.test(outputDir.trim())) {
      throw new PlanValidationError(
        'InvalidValue',
        'metadata.outputDirOverride',
        `Output directory "${outputDir}" must not contain whitespace.`,
      );
    }
    if (outputDir.startsWith('/') || normalizeDir(outputDir).split('/').includes('..')) {
      throw new PlanValidationError(
        'InvalidValue',
        'metadata.outputDirOverride',
        `Output directory "${outputDir}" must be a relative path inside the project.`,
      );
    }
  }

  return plan;
}
