import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { fileURLToPath } from 'url';
import path from 'path';
import { cp, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';

vi.mock('../../src/ui/logger.js', () => ({
  logger: {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    header: vi.fn(),
    dim: vi.fn(),
    debug: vi.fn(),
    field: vi.fn(),
    fileWritten: vi.fn(),
  },
}));

vi.mock('../../src/ui/spinner.js', () => ({
  withSpinner: vi.fn(async (_text: string, fn: () => Promise<unknown>) => fn()),
}));

import { detectCommand } from '../../src/commands/detect.js';
import { planCommand } from '../../src/commands/plan.js';
import { prepareCommand } from '../../src/commands/prepare.js';
import { resolveProjectPlan } from '../../src/core/pipeline.js';
import { logger } from '../../src/ui/logger.js';
import { fileExists } from '../../src/utils/fs.js';
import {
  DetectionError,
  PlanFileError,
  ProjectNotFoundError,
} from '../../src/utils/errors.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const fixturesDir = path.resolve(__dirname, '../fixtures');

const HEADER =
  '# syntax=docker/dockerfile:1\n' +
  '# Generated by dockplan. Change dockplan.json or the overrides, not this file.\n';

describe('Prepare flow integration', () => {
  let root: string;

  async function useFixture(name: string): Promise<void> {
    await cp(path.join(fixturesDir, name), root, { recursive: true });
  }

  function dockerfilePath(): string {
    return path.join(root, '.dockplan', 'Dockerfile');
  }

  beforeEach(async () => {
    vi.clearAllMocks();
    root = await mkdtemp(path.join(tmpdir(), 'dockplan-prepare-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should generate install, build and runtime stages for a Node server', async () => {
    await useFixture('node-project');

    await prepareCommand({ path: root, overrides: {}, env: {} });

    expect(await readFile(dockerfilePath(), 'utf-8')).toBe(
      HEADER +
        '\n' +
        'FROM node:20-slim AS base\n' +
        'WORKDIR /app\n' +
        '\n' +
        'FROM base AS install\n' +
        'COPY . .\n' +
        'RUN npm ci\n' +
        '\n' +
        'FROM install AS build\n' +
        'RUN npm run build\n' +
        '\n' +
        'FROM build AS runtime\n' +
        'CMD ["sh", "-c", "npm run start"]\n',
    );
    expect(logger.info).toHaveBeenCalledWith('Detected node application');
    expect(logger.fileWritten).toHaveBeenCalledWith(path.join('.dockplan', 'Dockerfile'), 'created');
  });

  it('should serve a single-page app from its build folder with SPA fallback', async () => {
    await useFixture('vite-spa');

    const { plan } = await resolveProjectPlan(root, { env: {} });
    expect(plan.metadata).toEqual({ isSpa: true, outputDirOverride: 'dist' });

    await prepareCommand({ path: root, overrides: {}, env: {} });

    expect(await readFile(dockerfilePath(), 'utf-8')).toBe(
      HEADER +
        '\n' +
        'FROM node:22-slim AS base\n' +
        'WORKDIR /app\n' +
        '\n' +
        'FROM base AS install\n' +
        'COPY . .\n' +
        'RUN npm install\n' +
        '\n' +
        'FROM install AS build\n' +
        'RUN npm run build\n' +
        '\n' +
        'FROM caddy:2-alpine AS runtime\n' +
        'COPY --from=build /app/dist /srv\n' +
        "COPY <<'EOF' /etc/caddy/Caddyfile\n" +
        ':80 {\n' +
        '    root * /srv\n' +
        '    encode gzip\n' +
        '    try_files {path} /index.html\n' +
        '    file_server\n' +
        '}\n' +
        'EOF\n' +
        'EXPOSE 80\n',
    );
  });

  it('should union packages from the plan file, the command line and the environment', async () => {
    await useFixture('go-project');
    await writeFile(
      path.join(root, 'dockplan.json'),
      JSON.stringify({
        language: 'go',
        installCommand: 'go mod download',
        buildCommand: 'go build -o server .',
        startCommand: './server',
        metadata: { custom_packages: ['ca-certificates', 'git'] },
      }),
    );

    const { plan, source } = await resolveProjectPlan(root, {
      cli: { packages: ['git'] },
      env: { DOCKPLAN_PACKAGES: 'curl,wget,git' },
    });

    expect(source).toEqual({ kind: 'plan-file', path: path.join(root, 'dockplan.json') });
    expect(plan.metadata.customPackages).toEqual(['ca-certificates', 'git', 'curl', 'wget']);

    await prepareCommand({
      path: root,
      overrides: { packages: ['git'] },
      env: { DOCKPLAN_PACKAGES: 'curl,wget,git' },
    });
    expect(await readFile(dockerfilePath(), 'utf-8')).toContain(
      '    && apt-get install -y --no-install-recommends ca-certificates git curl wget \\\n',
    );
  });

  it('should drop SPA mode when enable and disable signals are both given', async () => {
    await useFixture('vite-spa');

    const fromCli = await resolveProjectPlan(root, { cli: { spa: true, noSpa: true }, env: {} });
    expect(fromCli.plan.metadata.isSpa).toBeUndefined();

    const fromEnv = await resolveProjectPlan(root, {
      env: { DOCKPLAN_SPA: 'true', DOCKPLAN_NO_SPA: 'true' },
    });
    expect(fromEnv.plan.metadata.isSpa).toBeUndefined();

    await prepareCommand({ path: root, overrides: { spa: true, noSpa: true }, env: {} });
    const dockerfile = await readFile(dockerfilePath(), 'utf-8');
    expect(dockerfile).toContain('COPY --from=build /app/dist /srv\n');
    expect(dockerfile).not.toContain('try_files');
  });

  it('should fail with NoApplicationDetected and write nothing for an empty directory', async () => {
    await expect(prepareCommand({ path: root, overrides: {}, env: {} })).rejects.toBeInstanceOf(
      DetectionError,
    );
    await expect(prepareCommand({ path: root, overrides: {}, env: {} })).rejects.toMatchObject({
      reason: 'NoApplicationDetected',
    });
    expect(await fileExists(path.join(root, '.dockplan'))).toBe(false);
  });

  it('should let command line overrides beat environment overrides', async () => {
    await useFixture('node-project');

    const { plan } = await resolveProjectPlan(root, {
      cli: { startCommand: 'node dist/cli.js' },
      env: { DOCKPLAN_START_CMD: 'node dist/env.js', DOCKPLAN_BUILD_CMD: 'npm run build:prod' },
    });

    expect(plan.startCommand).toBe('node dist/cli.js');
    expect(plan.buildCommand).toBe('npm run build:prod');
  });

  it('should print the Dockerfile instead of writing it on a dry run', async () => {
    await useFixture('python-project');
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    try {
      await prepareCommand({ path: root, overrides: {}, env: {}, dryRun: true });
      const printed = write.mock.calls.map((call) => String(call[0])).join('');
      expect(printed).toContain('FROM python:3.11-slim AS base\n');
      expect(printed).toContain('CMD ["sh", "-c", "uvicorn main:app --host 0.0.0.0 --port 8000"]\n');
    } finally {
      write.mockRestore();
    }
    expect(await fileExists(path.join(root, '.dockplan'))).toBe(false);
  });

  it('should stop at a broken plan file without falling back to detection', async () => {
    await useFixture('node-project');
    await writeFile(path.join(root, 'dockplan.json'), '{ "startCommand": ');

    await expect(prepareCommand({ path: root, overrides: {}, env: {} })).rejects.toBeInstanceOf(
      PlanFileError,
    );
    expect(await fileExists(dockerfilePath())).toBe(false);
  });

  it('should report an update when the Dockerfile already exists', async () => {
    await useFixture('static-site');

    await prepareCommand({ path: root, overrides: {}, env: {} });
    await prepareCommand({ path: root, overrides: { staticServer: 'nginx' }, env: {} });

    expect(logger.fileWritten).toHaveBeenLastCalledWith(
      path.join('.dockplan', 'Dockerfile'),
      'modified',
    );
    expect(await readFile(dockerfilePath(), 'utf-8')).toContain('FROM nginx:1.27-alpine AS runtime\n');
  });

  it('should reject a path that is not a directory', async () => {
    await expect(
      prepareCommand({ path: path.join(root, 'missing'), overrides: {}, env: {} }),
    ).rejects.toBeInstanceOf(ProjectNotFoundError);
  });

  it('should print the resolved plan as JSON', async () => {
    await useFixture('go-project');
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    try {
      await planCommand({
        path: root,
        overrides: { runtimeVersion: '1.23' },
        format: 'json',
        env: { DOCKPLAN_PACKAGES: 'git' },
      });
      const printed = write.mock.calls.map((call) => String(call[0])).join('');
      expect(JSON.parse(printed)).toEqual({
        language: 'go',
        packageManager: 'go',
        runtimeVersion: '1.23',
        installCommand: 'go mod download',
        buildCommand: 'CGO_ENABLED=0 go build -o server .',
        startCommand: './server',
        buildEnv: {},
        metadata: { custom_packages: ['git'] },
      });
    } finally {
      write.mockRestore();
    }
  });

  it('should list the detected plan and the other matching providers', async () => {
    await useFixture('polyglot');

    await detectCommand({ path: root });

    expect(logger.header).toHaveBeenCalledWith('Detected: python');
    expect(logger.dim).toHaveBeenCalledWith('Also matched: static');
    expect(logger.field).toHaveBeenCalledWith('Start', 'python app.py');
  });
});
