export class AgentError extends Error {
  constructor(message: string, public code?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AgentError';
  }
}

export class ConfigurationError extends AgentError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class ModelError extends AgentError {
  constructor(message: string, public modelName?: string, public status?: number) {
    super(message, 'MODEL_ERROR');
    this.name = 'ModelError';
  }
}

/**
 * The model answered, but its output does not satisfy the requested contract.
 * Always fatal for the run.
 */
export class SchemaValidationError extends AgentError {
  constructor(message: string, public contractName: string, public issues: string[] = []) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

/**
 * Business-level rejection from the remote service (not found, validation,
 * permission). The decision loop turns these into observations.
 */
export class DomainApiError extends AgentError {
  constructor(
    message: string,
    public apiCode: string,
    public status?: number,
    public detail?: string
  ) {
    super(message, 'DOMAIN_API_ERROR');
    this.name = 'DomainApiError';
  }
}

export class TransportError extends AgentError {
  constructor(message: string, public endpoint?: string, options?: { cause?: unknown }) {
    super(message, 'TRANSPORT_ERROR', options);
    this.name = 'TransportError';
  }
}

export class PaginationError extends AgentError {
  constructor(message: string, public pageSize: number, options?: { cause?: unknown }) {
    super(message, 'PAGINATION_ERROR', options);
    this.name = 'PaginationError';
  }
}

export class RunStateError extends AgentError {
  constructor(message: string) {
    super(message, 'RUN_STATE_ERROR');
    this.name = 'RunStateError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
