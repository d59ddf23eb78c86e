import { createPlan } from '../core/plan.js';
import type { Plan } from '../core/plan.js';
import type { ProjectSnapshot } from '../core/snapshot.js';
import { hasDigit, matchInFile, readVersionFile } from './manifest.js';
import type { LanguageProvider } from './types.js';

export type PythonPackageManager = 'pip' | 'poetry' | 'pipenv' | 'uv';

const MANIFESTS = ['requirements.txt', 'pyproject.toml', 'Pipfile', 'setup.py'];
const ENTRY_MODULES = ['main', 'app'];
const BIND = '0.0.0.0:8000';

export function detectPythonPackageManager(snapshot: ProjectSnapshot): PythonPackageManager {
  if (snapshot.exists('uv.lock')) return 'uv';
  if (snapshot.exists('poetry.lock')) return 'poetry';
  if (/^\[tool\.poetry\]/m.test(snapshot.read('pyproject.toml') ?? '')) return 'poetry';
  if (snapshot.exists('Pipfile')) return 'pipenv';
  return 'pip';
}

function installCommand(snapshot: ProjectSnapshot, manager: PythonPackageManager): string {
  switch (manager) {
    case 'uv':
      return 'pip install --no-cache-dir uv && uv sync --frozen --no-dev';
    case 'poetry':
      return 'pip install --no-cache-dir poetry && poetry config virtualenvs.create false && poetry install --no-root --only main';
    case 'pipenv':
      return 'pip install --no-cache-dir pipenv && pipenv install --system --deploy';
    case 'pip':
      return snapshot.exists('requirements.txt')
        ? 'pip install --no-cache-dir -r requirements.txt'
        : 'pip install --no-cache-dir .';
  }
}

function dependencyText(snapshot: ProjectSnapshot): string {
  return MANIFESTS.map((file) => snapshot.read(file) ?? '')
    .join('\n')
    .toLowerCase();
}

function dependsOn(deps: string, name: string): boolean {
  return new RegExp(`(^|[^a-z0-9_-])${name}([^a-z0-9_-]|$)`, 'm').test(deps);
}

function findEntryModule(snapshot: ProjectSnapshot): string | undefined {
  return ENTRY_MODULES.find((mod) => snapshot.exists(`${mod}.py`));
}

function djangoStart(snapshot: ProjectSnapshot, deps: string): string {
  const project = snapshot
    .list('')
    .find((entry) => snapshot.isDirectory(entry) && snapshot.exists(`${entry}/wsgi.py`));
  if (project && dependsOn(deps, 'gunicorn')) {
    return `gunicorn ${project}.wsgi:application --bind ${BIND}`;
  }
  return `python manage.py runserver ${BIND}`;
}

function startCommand(snapshot: ProjectSnapshot, deps: string): string {
  if (snapshot.exists('manage.py') && dependsOn(deps, 'django')) {
    return djangoStart(snapshot, deps);
  }

  const entry = findEntryModule(snapshot);
  if (!entry) return '';

  if (dependsOn(deps, 'fastapi')) {
    return `uvicorn ${entry}:app --host 0.0.0.0 --port 8000`;
  }
  if (dependsOn(deps, 'flask') && dependsOn(deps, 'gunicorn')) {
    return `gunicorn ${entry}:app --bind ${BIND}`;
  }
  return `python ${entry}.py`;
}

function detectPythonVersion(snapshot: ProjectSnapshot): string | undefined {
  const pinned = readVersionFile(snapshot, ['.python-version', 'runtime.txt'])?.replace(
    /^python-/,
    '',
  );
  if (hasDigit(pinned)) return pinned;
  return matchInFile(snapshot, 'pyproject.toml', /^requires-python\s*=\s*["']([^"']+)["']/m);
}

export const pythonProvider: LanguageProvider = {
  name: 'python',
  language: 'python',

  matches(snapshot) {
    return MANIFESTS.some((file) => snapshot.exists(file));
  },

  defaultPlan(snapshot): Plan {
    const manager = detectPythonPackageManager(snapshot);
    const deps = dependencyText(snapshot);
    const start = startCommand(snapshot, deps);

    const plan = createPlan({
      language: 'python',
      packageManager: manager,
      installCommand: installCommand(snapshot, manager),
      startCommand: start !== '' && manager === 'uv' ? `uv run ${start}` : start,
    });

    const version = detectPythonVersion(snapshot);
    if (version) plan.runtimeVersion = version;
    return plan;
  },
};
