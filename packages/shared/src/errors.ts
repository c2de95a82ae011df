/**
 * Base class for failures raised by the toolpath engine.
 * Anything deriving from it is caller-correctable and aborts the whole run.
 */
export abstract class ToolpathError extends Error {
  abstract readonly code: string;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends ToolpathError {
  readonly code = 'VALIDATION_ERROR';

  constructor(readonly messages: string[]) {
    super(messages.join('; '));
  }
}

export class InvalidGeometryError extends ToolpathError {
  readonly code = 'INVALID_GEOMETRY';

  constructor(message: string, readonly operationIndex?: number) {
    super(operationIndex === undefined ? message : `operations[${operationIndex}]: ${message}`);
  }
}

export const isToolpathError = (error: unknown): error is ToolpathError =>
  error instanceof ToolpathError;

const describeKind = (value: unknown): string =>
  typeof value === 'object' && value !== null && 'kind' in value ? String(value.kind) : String(value);

/**
 * Exhaustiveness guard for tagged unions arriving from untyped callers.
 * @param label what was being matched, e.g. "operation".
 */
export const unsupportedKind = (value: never, label: string): never => {
  throw new ValidationError([`Unsupported ${label} kind: ${describeKind(value)}`]);
};
