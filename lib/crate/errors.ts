/**
 * - 'invalid_input': rejected before any layout work
 * - 'capacity_exceeded': more instances than a fixed slot array holds
 * - 'non_convergence': reconciliation hit its pass cap (configuration bug)
 */
export type CrateLayoutErrorCode = 'invalid_input' | 'capacity_exceeded' | 'non_convergence';

export class CrateLayoutError extends Error {
  readonly code: CrateLayoutErrorCode;
  readonly details?: unknown;

  constructor(code: CrateLayoutErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'CrateLayoutError';
    this.code = code;
    this.details = details;
  }
}

export function isCrateLayoutError(error: unknown): error is CrateLayoutError {
  return error instanceof CrateLayoutError;
}
