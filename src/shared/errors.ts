/**
 * The corpus database is missing, unreadable, or not an incident corpus.
 * Fatal for every retrieval and scoring call.
 */
export class CorpusUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CorpusUnavailableError";
  }
}

/**
 * The full-text engine rejected a search expression.
 * Callers degrade to substring matching; it never reaches the user.
 */
export class MalformedQueryError extends Error {
  readonly expression: string;

  constructor(expression: string, options?: { cause?: unknown }) {
    super(`Malformed full-text query: ${expression}`, options);
    this.name = "MalformedQueryError";
    this.expression = expression;
  }
}
