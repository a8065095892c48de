/**
 * @shareport/runtime — Errors.
 */

import type { ErrorCategory } from "@shareport/types";
import { ShareportError } from "@shareport/types";

export type RuntimeErrorCode =
  | "INVALID_ADDRESS"
  | "INVALID_AMOUNT"
  | "INVALID_TIME"
  | "INVALID_EVENT"
  | "REENTRANT_CALL"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "UNKNOWN_ASSET"
  | "UNRECOGNIZED_CALLER"
  | "UNRECOGNIZED_DESTINATION";

const CATEGORIES: Record<RuntimeErrorCode, ErrorCategory> = {
  INVALID_ADDRESS: "validation",
  INVALID_AMOUNT: "validation",
  INVALID_TIME: "validation",
  INVALID_EVENT: "validation",
  REENTRANT_CALL: "state",
  INSUFFICIENT_BALANCE: "policy",
  INSUFFICIENT_ALLOWANCE: "policy",
  UNKNOWN_ASSET: "validation",
  UNRECOGNIZED_CALLER: "authorization",
  UNRECOGNIZED_DESTINATION: "authorization",
};

export class RuntimeError extends ShareportError<RuntimeErrorCode> {
  constructor(code: RuntimeErrorCode, message: string) {
    super(code, CATEGORIES[code], message);
    this.name = "RuntimeError";
  }
}
