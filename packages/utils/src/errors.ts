export type ZkPigErrorMetaData = Record<string, string | number | string[] | null>;

/**
 * Generic zk-pig error with attached metadata
 *
 * ```ts
 * enum FetchErrorCode {NOT_FOUND = "FETCH_ERROR_NOT_FOUND"}
 * type FetchErrorType = {code: FetchErrorCode.NOT_FOUND; path: string};
 * class FetchError extends ZkPigError<FetchErrorType> {}
 * ```
 */
export class ZkPigError<T extends {code: string}> extends Error {
  type: T;
  constructor(type: T, message?: string, options?: {cause?: unknown}) {
    super(message || type.code, options);
    this.type = type;
  }

  getMetadata(): ZkPigErrorMetaData {
    return this.type;
  }

  /**
   * Get the metadata and the stacktrace for the error.
   */
  toObject(): ZkPigErrorMetaData {
    return {
      // Ignore message since it's just type.code
      ...this.getMetadata(),
      stack: this.stack || "",
    };
  }
}

/**
 * Message of anything caught in a `catch` clause
 */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
