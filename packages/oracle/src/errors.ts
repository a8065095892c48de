/**
 * @shareport/oracle — Errors.
 */

import type { ErrorCategory } from "@shareport/types";
import { ShareportError } from "@shareport/types";

export type OracleErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_PRICE"
  | "EMPTY_SOURCE"
  | "INVALID_POLICY";

const CATEGORIES: Record<OracleErrorCode, ErrorCategory> = {
  UNAUTHORIZED: "authorization",
  INVALID_PRICE: "validation",
  EMPTY_SOURCE: "validation",
  INVALID_POLICY: "policy",
};

export class OracleError extends ShareportError<OracleErrorCode> {
  constructor(code: OracleErrorCode, message: string) {
    super(code, CATEGORIES[code], message);
    this.name = "OracleError";
  }
}
