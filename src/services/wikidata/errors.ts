/**
 * Knowledge base client errors
 *
 * @module services/wikidata/errors
 */

export type KnowledgeBaseErrorCode =
  | 'QUERY_FAILED'
  | 'IDENTIFIER_NOT_FOUND'
  | 'REMOTE_WRITE_REJECTED'
  | 'WRITER_NOT_CONFIGURED';

export class KnowledgeBaseError extends Error {
  constructor(
    message: string,
    public readonly code: KnowledgeBaseErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'KnowledgeBaseError';
    Error.captureStackTrace?.(this, KnowledgeBaseError);
  }
}
