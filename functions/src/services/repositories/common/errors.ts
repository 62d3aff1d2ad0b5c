/**
 * A stored document failed schema validation on read.
 */
export class RepositoryValidationError extends Error {
  readonly code = 'validation_failed' as const;
  readonly documentPath: string;

  constructor(documentPath: string, message: string) {
    super(message);
    this.name = 'RepositoryValidationError';
    this.documentPath = documentPath;
  }
}
