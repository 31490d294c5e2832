import type { ParsedFrame } from './Frame.js';

/** Error codes produced by frame validation. */
export type FrameValidationErrorCode = 'MISSING_SECTION' | 'UNEXPECTED_LABEL' | 'SECTION_CARDINALITY' | 'MALFORMED_NUMBER';

/** A single validation failure, always attributed to one section. */
export interface FrameValidationError {
  /** Name of the section that failed validation. */
  readonly section: string;
  /** Human-readable error message. */
  readonly message: string;
  /** Machine-readable error code. */
  readonly code: FrameValidationErrorCode;
  /** Required value count of the section. */
  readonly expected?: number;
  /** Value count actually found (cardinality failures only). */
  readonly observed?: number;
  /** Offending token, when one exists. */
  readonly value?: string;
}

export type FrameValidationResult =
  | { readonly isValid: true; readonly errors: readonly []; readonly parsed: ParsedFrame }
  | { readonly isValid: false; readonly errors: readonly [FrameValidationError] };

export function validResult(parsed: ParsedFrame): FrameValidationResult {
  return { isValid: true, errors: [], parsed };
}

/** A frame fails on its first offending section; later sections are not examined. */
export function invalidResult(error: FrameValidationError): FrameValidationResult {
  return { isValid: false, errors: [error] };
}
