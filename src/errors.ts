export class StreamOpsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StreamOpsError';
  }
}

// --- TRANSPORT ---

export class ConnectionClosedError extends StreamOpsError {
  constructor() {
    super("Connection closed");
    this.name = 'ConnectionClosedError';
  }
}

export class RequestTimeoutError extends StreamOpsError {
  constructor(timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

export class NotConnectedError extends StreamOpsError {
  constructor() {
    super("Client not connected");
    this.name = 'NotConnectedError';
  }
}

// --- WORKFLOW GUARDS ---

export class ReadOnlyError extends StreamOpsError {
  constructor(action: string) {
    super(`Cannot ${action} in read-only mode`);
    this.name = 'ReadOnlyError';
  }
}

export class EmptySelectionError extends StreamOpsError {
  constructor() {
    super("No streams matched. Run a preview first.");
    this.name = 'EmptySelectionError';
  }
}

export class StalePreviewError extends StreamOpsError {
  constructor() {
    super("Filter changed since the last preview. Run a preview first.");
    this.name = 'StalePreviewError';
  }
}

export class WorkflowStateError extends StreamOpsError {
  constructor(operation: string, state: string) {
    super(`Cannot ${operation} while ${state}`);
    this.name = 'WorkflowStateError';
  }
}

// --- PRESETS ---

export class DuplicatePresetError extends StreamOpsError {
  constructor(name: string) {
    super(`Filter '${name}' already exists`);
    this.name = 'DuplicatePresetError';
  }
}

export class InvalidPresetError extends StreamOpsError {
  constructor(reason: string) {
    super(reason);
    this.name = 'InvalidPresetError';
  }
}

// --- INPUT / CONFIG ---

export class InvalidFilterValueError extends StreamOpsError {
  constructor(public readonly field: string, public readonly value: string) {
    super(`Invalid ${field} value '${value}': expected an integer`);
    this.name = 'InvalidFilterValueError';
  }
}

export class ConfigError extends StreamOpsError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
