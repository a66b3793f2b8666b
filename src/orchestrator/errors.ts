import type { NodeName, Phase } from './states';

export class WorkflowError extends Error {
  constructor(
    message: string,
    public code: string,
    public originalError?: unknown,
  ) {
    super(message);
    this.name = 'WorkflowError';
  }
}

export class InvalidTransitionError extends WorkflowError {
  constructor(
    public from: Phase,
    public to: Phase,
    reason = 'not in transition table',
  ) {
    super(`Invalid phase transition [${from}] -> [${to}]: ${reason}`, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
  }
}

export class NodeExecutionError extends WorkflowError {
  constructor(
    public node: NodeName,
    originalError: unknown,
  ) {
    super(`Node ${node} failed: ${describeError(originalError)}`, 'NODE_EXECUTION_FAILED', originalError);
    this.name = 'NodeExecutionError';
  }
}

export class SessionNotFoundError extends WorkflowError {
  constructor(sessionId: string) {
    super(`Session ${sessionId} not found`, 'SESSION_NOT_FOUND');
    this.name = 'SessionNotFoundError';
  }
}

export class ConfigError extends WorkflowError {
  constructor(public issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'INVALID_CONFIG');
    this.name = 'ConfigError';
  }
}

/** Message text of anything thrown */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
