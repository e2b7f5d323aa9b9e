/**
 * Conversion outcomes and the boundary contract handed to the HTTP layer.
 */

export type ConversionErrorKind =
  | 'InvalidInput'
  | 'Timeout'
  | 'ToolFailure'
  | 'OutputMissing'
  | 'Unexpected';

export type ConversionOutcome =
  | { ok: true; outputBytes: Buffer; base64Output: string }
  | { ok: false; kind: ConversionErrorKind; message: string };

export type ConversionFailure = Extract<ConversionOutcome, { ok: false }>;

export interface ConversionResponse {
  success: boolean;
  base64Output: string;
  errorMessage: string;
}

/** Anything that turns a base64 PDF into a conversion outcome */
export interface Converter {
  convert(base64Input: string, signal?: AbortSignal): Promise<ConversionOutcome>;
}

export function toResponse(outcome: ConversionOutcome): ConversionResponse {
  if (outcome.ok) {
    return { success: true, base64Output: outcome.base64Output, errorMessage: '' };
  }
  return { success: false, base64Output: '', errorMessage: outcome.message };
}
