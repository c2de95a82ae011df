import type { Issue, MachineBounds, Operation } from '@toolpath/shared';
import { operationIssues, type ValidateOptions } from './operations';

export * from './operations';
export * from './tooling';

export const formatIssue = (issue: Issue): string =>
  issue.operationIndex === undefined ? issue.message : `operations[${issue.operationIndex}]: ${issue.message}`;

export const errorsOf = (issues: readonly Issue[]): string[] =>
  issues.filter((issue) => issue.severity === 'error').map(formatIssue);

export const warningsOf = (issues: readonly Issue[]): string[] =>
  issues.filter((issue) => issue.severity === 'warning').map(formatIssue);

/**
 * Checks operations against the machine envelope before generation.
 * @returns one message per blocking problem; empty when generation may proceed.
 */
export const validate = (
  operations: readonly Operation[],
  bounds: MachineBounds,
  options: ValidateOptions = {},
): string[] => errorsOf(operationIssues(operations, bounds, options));
