/**
 * Standardized error class for throwing errors internal to this project.
 * The `code` is one of the values in `ErrorCode`.
 */
export default class ContractError extends Error {
  constructor (public code: string, message?: string) {
    super(message ? message : code);

    // NOTE: Extending 'Error' breaks prototype chain since TypeScript 2.1.
    // The following line restores prototype chain.
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Returns a new ContractError object using the inputs.
   *
   * @param code The error code.
   * @param err The caught value; its message is used if it is an `Error`.
   * @param context Optional text prepended to the message, e.g. the path being read.
   */
  public static createFromError (code: string, err: unknown, context?: string): ContractError {
    const cause = err instanceof Error ? err.message : String(err);
    if (context === undefined) {
      return new ContractError(code, cause);
    }

    return new ContractError(code, cause ? `${context}: ${cause}` : context);
  }

  /**
   * Converts the given error into a string.
   */
  public static stringify (error: unknown): string {
    if (error instanceof Error) {
      return JSON.stringify(error, Object.getOwnPropertyNames(error));
    }

    return String(error);
  }
}
