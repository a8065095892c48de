/**
 * Error Taxonomy
 *
 * Every rejection in Shareport aborts the whole operation and surfaces
 * synchronously to the caller. There is no retryable/fatal split at this
 * layer; the category only says what kind of input was wrong.
 */

export type ErrorCategory =
  | "authorization" // wrong caller for a privileged entry point
  | "validation"    // malformed input (zero address, bad index, ...)
  | "state"         // object not in the expected lifecycle state
  | "policy"        // limit or floor not met
  | "hook";         // a hook's own business reason

/**
 * Base class for every domain error thrown by Shareport packages.
 */
export class ShareportError<TCode extends string = string> extends Error {
  public readonly code: TCode;
  public readonly category: ErrorCategory;

  constructor(code: TCode, category: ErrorCategory, message: string) {
    super(message);
    this.name = "ShareportError";
    this.code = code;
    this.category = category;
  }
}
