/**
 * Centralized error handling for the serverless functions and the Express routes
 */
import { IndexUnavailableError, RagError } from '../../shared/lib/errors.js';

/** The part of VercelResponse / express.Response the handlers need */
export interface JsonResponse {
  status(statusCode: number): JsonResponse;
  json(body: unknown): unknown;
}

export interface ApiErrorBody {
  error: string;
  kind: string;
  reason?: string;
}

export function statusForError(error: unknown): number {
  if (!(error instanceof RagError)) return 500;
  switch (error.kind) {
    case 'InvalidRequest':
      return 400;
    case 'IndexUnavailable':
      return 503;
    case 'EmbeddingUnavailable':
      return 502;
    default:
      return 500;
  }
}

export function toErrorBody(error: unknown): ApiErrorBody {
  if (error instanceof IndexUnavailableError) {
    return { error: error.message, kind: error.kind, reason: error.reason };
  }
  if (error instanceof RagError) {
    return { error: error.message, kind: error.kind };
  }
  return { error: 'Internal Server Error', kind: 'Internal' };
}

export function handleError(res: JsonResponse, error: unknown): void {
  const statusCode = statusForError(error);
  if (statusCode >= 500) {
    console.error('❌ API Error:', error instanceof Error ? error.stack ?? error.message : String(error));
  }
  res.status(statusCode).json(toErrorBody(error));
}
