import {
  createPlan,
  isStaticPlan,
  parsePlan,
  resolveOutputDir,
  serializePlan,
  uniquePackages,
  validatePlan,
} from '../../src/core/plan.js';
import type { Plan } from '../../src/core/plan.js';
import { PlanFileError, PlanValidationError } from '../../src/utils/errors.js';

function validationError(plan: Plan): unknown {
  try {
    validatePlan(plan);
    return undefined;
  } catch (error) {
    return error;
  }
}

function validationReason(plan: Plan): string | undefined {
  try {
    validatePlan(plan);
    return undefined;
  } catch (error) {
    if (error instanceof PlanValidationError) return error.reason;
    throw error;
  }
}

describe('createPlan', () => {
  it('should fill empty commands, build env and metadata', () => {
    expect(createPlan()).toEqual({
      installCommand: '',
      buildCommand: '',
      startCommand: '',
      buildEnv: {},
      metadata: {},
    });
  });

  it('should not share metadata with the input', () => {
    const metadata = { isSpa: true as const };
    const plan = createPlan({ metadata });
    delete plan.metadata.isSpa;
    expect(metadata.isSpa).toBe(true);
  });
});

describe('uniquePackages', () => {
  it('should keep the first occurrence of each package', () => {
    expect(uniquePackages(['git', 'curl', 'git', 'wget', 'curl'])).toEqual(['git', 'curl', 'wget']);
  });
});

describe('parsePlan', () => {
  it('should map snake_case metadata keys onto the plan', () => {
    const plan = parsePlan({
      language: 'node',
      packageManager: 'pnpm',
      installCommand: 'pnpm install --frozen-lockfile',
      buildCommand: 'pnpm run build',
      buildEnv: { NODE_ENV: 'production' },
      metadata: {
        static_server: 'nginx',
        is_spa: true,
        output_dir_override: 'build',
        custom_packages: ['git', 'git', 'curl'],
      },
    });

    expect(plan).toEqual({
      language: 'node',
      packageManager: 'pnpm',
      installCommand: 'pnpm install --frozen-lockfile',
      buildCommand: 'pnpm run build',
      startCommand: '',
      buildEnv: { NODE_ENV: 'production' },
      metadata: {
        staticServer: 'nginx',
        isSpa: true,
        outputDirOverride: 'build',
        customPackages: ['git', 'curl'],
      },
    });
  });

  it('should treat is_spa: false as absent', () => {
    const plan = parsePlan({ startCommand: './server', metadata: { is_spa: false } });
    expect(plan.metadata).toEqual({});
  });

  it('should leave language unset when the file has none or an empty one', () => {
    expect(parsePlan({ startCommand: 'x' }).language).toBeUndefined();
    expect(parsePlan({ language: '', startCommand: 'x' }).language).toBeUndefined();
  });

  it('should ignore unknown metadata keys', () => {
    const plan = parsePlan({ startCommand: 'x', metadata: { future_key: 1, is_spa: true } });
    expect(plan.metadata).toEqual({ isSpa: true });
  });

  it('should reject unknown top-level keys', () => {
    expect(() => parsePlan({ startCommand: 'x', port: 3000 }, 'dockplan.json')).toThrow(
      PlanFileError,
    );
  });

  it('should reject an unknown static server', () => {
    expect(() => parsePlan({ metadata: { static_server: 'apache' } })).toThrow(PlanFileError);
  });

  it('should reject a language it does not know', () => {
    expect(() => parsePlan({ language: 'cobol' })).toThrow(/language/);
  });
});

describe('serializePlan', () => {
  it('should round-trip through parsePlan', () => {
    const plan = createPlan({
      language: 'python',
      packageManager: 'poetry',
      runtimeVersion: '3.11',
      baseImage: 'python:3.11-bookworm',
      installCommand: 'poetry install',
      startCommand: 'python main.py',
      buildEnv: { DEBUG: '0' },
      metadata: { staticServer: 'caddy', customPackages: ['libpq-dev'] },
    });

    expect(parsePlan(serializePlan(plan))).toEqual(plan);
  });

  it('should emit snake_case metadata keys and omit absent ones', () => {
    const serialized = serializePlan(
      createPlan({ language: 'node', metadata: { isSpa: true, outputDirOverride: 'dist' } }),
    );
    expect(serialized.metadata).toEqual({ is_spa: true, output_dir_override: 'dist' });
    expect(serialized).not.toHaveProperty('packageManager');
  });
});

describe('resolveOutputDir', () => {
  it('should prefer the override, normalized', () => {
    expect(resolveOutputDir(createPlan({ metadata: { outputDirOverride: './build/' } }))).toBe(
      'build',
    );
  });

  it('should serve the project root for static plans', () => {
    expect(resolveOutputDir(createPlan({ language: 'static' }))).toBe('.');
  });

  it('should default SPA plans to dist', () => {
    expect(resolveOutputDir(createPlan({ language: 'node', metadata: { isSpa: true } }))).toBe(
      'dist',
    );
  });

  it('should return undefined for a plain application', () => {
    const plan = createPlan({ language: 'go', startCommand: './server' });
    expect(resolveOutputDir(plan)).toBeUndefined();
    expect(isStaticPlan(plan)).toBe(false);
  });
});

describe('validatePlan', () => {
  it('should accept a plan with only a start command', () => {
    const plan = createPlan({ language: 'python', startCommand: 'python main.py' });
    expect(validatePlan(plan)).toBe(plan);
  });

  it('should accept a static plan without commands', () => {
    expect(validationReason(createPlan({ language: 'static' }))).toBeUndefined();
  });

  it('should require at least one command for non-static plans', () => {
    expect(validationReason(createPlan({ language: 'node' }))).toBe('MissingRequiredField');
    expect(validationReason(createPlan())).toBe('MissingRequiredField');
  });

  it('should reject a start command on a static plan', () => {
    expect(validationReason(createPlan({ language: 'static', startCommand: 'serve' }))).toBe(
      'ConflictingMetadata',
    );
  });

  it('should reject package names that are not apt package names', () => {
    const plan = createPlan({
      language: 'go',
      startCommand: 'x',
      metadata: { customPackages: ['curl; rm -rf /'] },
    });
    expect(validationReason(plan)).toBe('InvalidValue');
  });

  it('should accept pinned package versions', () => {
    const plan = createPlan({
      language: 'go',
      startCommand: 'x',
      metadata: { customPackages: ['libssl3', 'postgresql-client=15+248', 'g++'] },
    });
    expect(validationReason(plan)).toBeUndefined();
  });

  it('should reject build env keys that are not variable names', () => {
    const plan = createPlan({ language: 'go', startCommand: 'x', buildEnv: { 'BAD-KEY': '1' } });
    expect(validationReason(plan)).toBe('InvalidValue');
  });

  it('should reject output directories outside the project', () => {
    for (const dir of ['/srv/site', '../site', 'dist/../../etc']) {
      const plan = createPlan({ language: 'static', metadata: { outputDirOverride: dir } });
      expect(validationReason(plan)).toBe('InvalidValue');
    }
  });

  it('should require a language or a base image to run commands on', () => {
    const plan = createPlan({ startCommand: './run.sh' });
    const error = validationError(plan);
    expect(error).toBeInstanceOf(PlanValidationError);
    expect(error).toMatchObject({ reason: 'MissingRequiredField', field: 'language' });
    expect(validationReason(createPlan({ startCommand: './run.sh', baseImage: 'alpine:3.20' }))).toBeUndefined();
  });

  it('should reject system packages on a plan that runs no command', () => {
    const plan = createPlan({ language: 'static', metadata: { customPackages: ['git'] } });
    expect(validationError(plan)).toMatchObject({
      reason: 'ConflictingMetadata',
      field: 'metadata.customPackages',
    });
  });

  it('should reject build env values spanning several lines', () => {
    const plan = createPlan({ language: 'node', buildCommand: 'npm run build', buildEnv: { A: 'x\ny' } });
    expect(validationReason(plan)).toBe('InvalidValue');
  });

  it('should reject whitespace in the output directory and the base image', () => {
    const blankDir = createPlan({ language: 'static', metadata: { outputDirOverride: '  ' } });
    expect(validationReason(blankDir)).toBe('InvalidValue');
    const spacedDir = createPlan({ language: 'static', metadata: { outputDirOverride: 'my site' } });
    expect(validationReason(spacedDir)).toBe('InvalidValue');
    const image = createPlan({ language: 'node', startCommand: 'x', baseImage: 'node:20 AS evil' });
    expect(validationReason(image)).toBe('InvalidValue');
  });
});
