/**
 * Orchestrator Error Types
 *
 * @module agent-orchestrator/orchestrator/errors
 */

/**
 * No catalog entry matches an explicit name or a free-text intent
 */
export class CatalogEntryNotFoundError extends Error {
  readonly code = 'ENTRY_NOT_FOUND';

  constructor(
    message: string,
    public readonly query: string,
  ) {
    super(message);
    this.name = 'CatalogEntryNotFoundError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CatalogEntryNotFoundError);
    }
  }

  static notFound(name: string): CatalogEntryNotFoundError {
    return new CatalogEntryNotFoundError(`No agent or workflow named '${name}'`, name);
  }

  static noMatch(intent: string): CatalogEntryNotFoundError {
    return new CatalogEntryNotFoundError(`Nothing in the catalog matches '${intent}'`, intent);
  }
}
