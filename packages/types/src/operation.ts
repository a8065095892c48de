/**
 * Operation Types
 *
 * Balance-changing operations are grouped by tag. Hook lists and
 * execution watermarks are keyed by these tags.
 */

export type OperationTag = "deposit" | "withdraw" | "transfer";

export const OPERATION_TAGS: readonly OperationTag[] = [
  "deposit",
  "withdraw",
  "transfer",
];
