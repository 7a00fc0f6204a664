/**
 * Raised when an organization's repositories cannot be listed, or it has none.
 * Aborts the whole scan.
 */
export class RepositoryListingError extends Error {
  readonly organization: string;

  constructor(organization: string, cause?: unknown) {
    super('No repositories found or error accessing the organization.', { cause });
    this.name = 'RepositoryListingError';
    this.organization = organization;
  }
}

/**
 * Raised for command-line option values that fail validation.
 */
export class InvalidOptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOptionError';
  }
}
