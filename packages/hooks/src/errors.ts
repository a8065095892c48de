/**
 * @shareport/hooks — Errors.
 */

import type { ErrorCategory, OperationTag } from "@shareport/types";
import { ShareportError } from "@shareport/types";

export type HookErrorCode =
  | "INVALID_HOOK"
  | "INDEX_OUT_OF_BOUNDS"
  | "HOOK_HAS_PROCESSED_OPERATIONS"
  | "INVALID_REORDER_LENGTH"
  | "DUPLICATE_INDEX"
  | "INVALID_CAP";

const CATEGORIES: Record<HookErrorCode, ErrorCategory> = {
  INVALID_HOOK: "validation",
  INDEX_OUT_OF_BOUNDS: "validation",
  HOOK_HAS_PROCESSED_OPERATIONS: "state",
  INVALID_REORDER_LENGTH: "validation",
  DUPLICATE_INDEX: "validation",
  INVALID_CAP: "validation",
};

export class HookError extends ShareportError<HookErrorCode> {
  constructor(code: HookErrorCode, message: string) {
    super(code, CATEGORIES[code], message);
    this.name = "HookError";
  }
}

/**
 * A hook rejected an operation. The hook's reason is carried verbatim.
 */
export class HookCheckFailedError extends ShareportError<"HOOK_CHECK_FAILED"> {
  readonly tag: OperationTag;
  readonly reason: string;

  constructor(tag: OperationTag, reason: string) {
    super("HOOK_CHECK_FAILED", "hook", `${tag} rejected by hook: ${reason}`);
    this.name = "HookCheckFailedError";
    this.tag = tag;
    this.reason = reason;
  }
}
