import { GenerationError } from '../utils/errors.js';
import { selectBaseImage } from './base-images.js';
import { DEFAULT_STATIC_SERVER, resolveOutputDir, validatePlan } from './plan.js';
import type { Plan } from './plan.js';
import { STATIC_PORT, renderStaticServer } from './static-servers.js';

export const APP_DIR = '/app';

export interface DockerfileStage {
  name: string;
  from: string;
  instructions: string[];
}

const HEADER = [
  '# syntax=docker/dockerfile:1',
  '# Generated by dockplan. Change dockplan.json or the overrides, not this file.',
];

/** Double-quoted instruction argument; Docker expands `$` inside ARG and ENV values. */
function quoteArg(value: string): string {
  return `"${value.replace(/[\\"$]/g, '\\$&')}"`;
}

/** A delimiter that no line of the body equals. */
function heredocDelimiter(lines: readonly string[]): string {
  let delimiter = 'EOF';
  for (let n = 1; lines.includes(delimiter); n++) {
    delimiter = `EOF_${n}`;
  }
  return delimiter;
}

function heredoc(instruction: string, content: string, target?: string): string {
  const lines = content.replace(/\r?\n$/, '').split(/\r?\n/);
  const delimiter = heredocDelimiter(lines);
  const head = `${instruction} <<'${delimiter}'${target ? ` ${target}` : ''}`;
  return [head, ...lines, delimiter].join('\n');
}

/** Commands spanning several lines run as one heredoc script. */
function run(command: string): string {
  const script = command.replace(/(\r?\n)+$/, '');
  return /\r?\n/.test(script) ? heredoc('RUN', script) : `RUN ${script}`;
}

/**
 * Renders a resolved plan as a multi-stage Dockerfile. Stages appear in the
 * fixed order base, packages, install, build, runtime; a stage whose command
 * is empty is left out.
 */
export class DockerfileGenerator {
  generate(plan: Plan): string {
    validatePlan(plan);
    return this.render(this.buildStages(plan));
  }

  buildStages(plan: Plan): DockerfileStage[] {
    const stages: DockerfileStage[] = [];
    const packages = plan.metadata.customPackages ?? [];
    // Packages only reach an image through a stage that runs a command.
    const needsBuilder =
      plan.installCommand !== '' ||
      plan.buildCommand !== '' ||
      plan.startCommand !== '';

    // The stage later stages build on.
    let previous: string | undefined;
    // The stage holding the application files, once one has copied them in.
    let sourceStage: string | undefined;

    if (needsBuilder) {
      stages.push({
        name: 'base',
        from: selectBaseImage(plan),
        instructions: [`WORKDIR ${APP_DIR}`],
      });
      previous = 'base';
    }

    if (previous && packages.length > 0) {
      stages.push(this.packagesStage(previous, packages));
      previous = 'packages';
    }

    if (previous && plan.installCommand !== '') {
      stages.push({
        name: 'install',
        from: previous,
        instructions: ['COPY . .', ...this.packageManagerSetup(plan), run(plan.installCommand)],
      });
      previous = 'install';
      sourceStage = 'install';
    }

    if (previous && plan.buildCommand !== '') {
      const instructions: string[] = [];
      if (!sourceStage) instructions.push('COPY . .');
      for (const key of Object.keys(plan.buildEnv).sort()) {
        instructions.push(`ARG ${key}=${quoteArg(plan.buildEnv[key])}`);
      }
      instructions.push(run(plan.buildCommand));
      stages.push({ name: 'build', from: previous, instructions });
      previous = 'build';
      sourceStage = 'build';
    }

    stages.push(this.runtimeStage(plan, previous, sourceStage));
    return stages;
  }

  render(stages: DockerfileStage[]): string {
    const blocks = stages.map((stage) =>
      [`FROM ${stage.from} AS ${stage.name}`, ...stage.instructions].join('\n'),
    );
    return [HEADER.join('\n'), ...blocks].join('\n\n') + '\n';
  }

  private packagesStage(from: string, packages: readonly string[]): DockerfileStage {
    return {
      name: 'packages',
      from,
      instructions: [
        [
          'RUN apt-get update \\',
          `    && apt-get install -y --no-install-recommends ${packages.join(' ')} \\`,
          '    && rm -rf /var/lib/apt/lists/*',
        ].join('\n'),
      ],
    };
  }

  private packageManagerSetup(plan: Plan): string[] {
    if (plan.language !== 'node') return [];
    if (plan.packageManager === 'pnpm' || plan.packageManager === 'yarn') {
      return ['RUN corepack enable'];
    }
    return [];
  }

  private runtimeStage(
    plan: Plan,
    previous: string | undefined,
    sourceStage: string | undefined,
  ): DockerfileStage {
    if (plan.startCommand !== '' && previous) {
      const instructions = sourceStage ? [] : ['COPY . .'];
      instructions.push(`CMD ["sh", "-c", ${JSON.stringify(plan.startCommand)}]`);
      return { name: 'runtime', from: previous, instructions };
    }

    const outputDir = resolveOutputDir(plan);
    if (outputDir === undefined) {
      throw new GenerationError(
        'NoRuntimeStrategy',
        'Plan has no start command and no static output to serve. Set a start command, enable SPA mode or set an output directory.',
      );
    }

    const server = renderStaticServer(plan.metadata.staticServer ?? DEFAULT_STATIC_SERVER, {
      isSpa: plan.metadata.isSpa === true,
    });
    const copyFiles = sourceStage
      ? `COPY --from=${sourceStage} ${outputDir === '.' ? APP_DIR : `${APP_DIR}/${outputDir}`} ${server.documentRoot}`
      : `COPY ${outputDir} ${server.documentRoot}`;

    return {
      name: 'runtime',
      from: server.image,
      instructions: [
        copyFiles,
        heredoc('COPY', server.config, server.configPath),
        `EXPOSE ${STATIC_PORT}`,
      ],
    };
  }
}

export function generateDockerfile(plan: Plan): string {
  return new DockerfileGenerator().generate(plan);
}
