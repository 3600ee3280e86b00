export class InfraError extends Error {
  readonly code: string;

  constructor(message: string, code = 'infra_error', options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'InfraError';
  }
}

export class PersistenceError extends InfraError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'persistence_error', options);
    this.name = 'PersistenceError';
  }
}

export class ConfigError extends InfraError {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'config_error');
    this.name = 'ConfigError';
  }
}
