/**
 * The citation file could not be read or is not a valid CFF document.
 * Fatal: the run stops and no updated document is produced.
 */
export class CffDocumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CffDocumentError";
  }
}

/**
 * Required run configuration is missing or invalid. Fatal.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function isFatalError(
  err: unknown,
): err is CffDocumentError | ConfigurationError {
  return err instanceof CffDocumentError || err instanceof ConfigurationError;
}
