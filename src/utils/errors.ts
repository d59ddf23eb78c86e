export type DetectionFailure = 'NoApplicationDetected';

export type PlanValidationFailure = 'MissingRequiredField' | 'ConflictingMetadata' | 'InvalidValue';

export type GenerationFailure = 'UnsupportedRuntimeVersion' | 'NoRuntimeStrategy' | 'TemplateFailure';

export class DetectionError extends Error {
  readonly reason: DetectionFailure;

  constructor(
    reason: DetectionFailure = 'NoApplicationDetected',
    message = 'No supported application detected. Add a dockplan.json plan file or check the path.',
  ) {
    super(message);
    this.name = 'DetectionError';
    this.reason = reason;
  }
}

export class PlanValidationError extends Error {
  readonly reason: PlanValidationFailure;
  readonly field: string;

  constructor(reason: PlanValidationFailure, field: string, message: string) {
    super(message);
    this.name = 'PlanValidationError';
    this.reason = reason;
    this.field = field;
  }
}

export class GenerationError extends Error {
  readonly reason: GenerationFailure;

  constructor(reason: GenerationFailure, message: string) {
    super(message);
    this.name = 'GenerationError';
    this.reason = reason;
  }
}

export class PlanFileError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`Invalid plan file ${path}: ${message}`);
    this.name = 'PlanFileError';
    this.path = path;
  }
}

export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigError';
    this.variable = variable;
  }
}

export class ProviderRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProviderRegistryError';
  }
}

export class ProjectNotFoundError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Path does not exist or is not a directory: ${path}`);
    this.name = 'ProjectNotFoundError';
    this.path = path;
  }
}
