export interface Environment {
  /**
   * Receives diagnostics, one line per call. Resolved style queries never
   * throw for a missing value, so this is where failures surface. Defaults to
   * console.log.
   */
  log(message: string): void;
  /**
   * Also log queries that are legal but unexpected, such as asking for the
   * resolved value of a custom property.
   */
  cssDebug: boolean;
}

export const defaultEnvironment: Environment = Object.freeze({
  log(message: string) {
    console.log(message);
  },
  cssDebug: false
});

/**
 * The live configuration. Assign to its fields to change behavior; compare
 * against defaultEnvironment to see whether a field was overridden.
 */
export const environment: Environment = {...defaultEnvironment};

export function resetEnvironment() {
  environment.log = defaultEnvironment.log;
  environment.cssDebug = defaultEnvironment.cssDebug;
}
