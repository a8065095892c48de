/**
 * Error envelopes.
 *
 * Every failure leaves the service in the shape
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

import { ZodError } from "zod";
import { ShareportError } from "@shareport/types";

export interface ErrorDetail {
  readonly code: string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: string,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}

/**
 * Map any thrown value to an envelope.
 *
 * Domain errors keep their code and category. Configuration errors list
 * the offending keys. Anything else is INTERNAL_ERROR with a generic message.
 */
export function toErrorEnvelope(thrown: unknown): ErrorEnvelope {
  if (thrown instanceof ShareportError) {
    return createErrorEnvelope(thrown.code, thrown.message, { category: thrown.category });
  }
  if (thrown instanceof ZodError) {
    return createErrorEnvelope("VALIDATION_ERROR", "Invalid configuration", {
      issues: thrown.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }
  return createErrorEnvelope("INTERNAL_ERROR", "Internal error");
}
