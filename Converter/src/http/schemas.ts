import { z } from 'zod';
import { decodedLength, isValidBase64 } from '../conversion/base64.js';
import { INVALID_BASE64_MESSAGE } from '../conversion/orchestrator.js';

export const REQUIRED_MESSAGE = 'Base64 PDF string is required';

export function sizeLimitMessage(maxInputBytes: number): string {
  return `Input PDF size exceeds maximum allowed size (${Math.floor(maxInputBytes / 1024 / 1024)} MB)`;
}

/**
 * Body of POST /convert. Checks run in order and stop at the first failure:
 * present, well-formed base64, decoded size within the limit.
 */
export function createConvertRequestSchema(maxInputBytes: number) {
  return z.object(
    {
      base64Pdf: z
        .string({ required_error: REQUIRED_MESSAGE, invalid_type_error: 'Base64 PDF string must be a string' })
        .superRefine((value, ctx) => {
          if (value.trim().length === 0) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: REQUIRED_MESSAGE });
            return;
          }
          if (!isValidBase64(value)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: INVALID_BASE64_MESSAGE });
            return;
          }
          if (decodedLength(value) > maxInputBytes) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: sizeLimitMessage(maxInputBytes) });
          }
        }),
    },
    { required_error: 'Request body is required', invalid_type_error: 'Request body must be a JSON object' },
  );
}

export interface ConvertResponseBody {
  success: boolean;
  base64PdfA: string;
  errorMessage: string;
}
