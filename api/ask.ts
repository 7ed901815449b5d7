/**
 * Vercel Serverless Function for /api/ask
 *
 * The service container lives at module scope, so a warm instance keeps its
 * loaded index between invocations. A cold instance loads it on the first
 * request.
 */
import type { VercelRequest, VercelResponse } from '@vercel/node';
import { InvalidRequestError } from '../shared/lib/errors.js';
import { getQueryServices } from '../src/service/services.js';
import { handleOptionsRequest, setCorsHeaders } from './_lib/cors.js';
import { handleError } from './_lib/errorHandler.js';

function readBody(req: VercelRequest): unknown {
  try {
    // the body getter throws on malformed JSON
    const body: unknown = req.body;
    return body;
  } catch (error) {
    throw new InvalidRequestError('Request body is not valid JSON', { cause: error });
  }
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  try {
    const services = getQueryServices();
    setCorsHeaders(req, res, services.allowedOrigin);

    if (req.method === 'OPTIONS') {
      return handleOptionsRequest(res);
    }

    if (req.method !== 'POST') {
      return res.status(405).json({ error: 'Method not allowed' });
    }

    const outcome = await services.orchestrator.run(readBody(req));

    if (outcome.result.isErr()) {
      return handleError(res, outcome.result.error);
    }
    res.status(200).json(outcome.result.value);
  } catch (error) {
    handleError(res, error);
  }
}
