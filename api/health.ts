import type { VercelRequest, VercelResponse } from '@vercel/node';
import { getQueryServices } from '../src/service/services.js';
import { setCorsHeaders, handleOptionsRequest } from './_lib/cors.js';
import { handleError } from './_lib/errorHandler.js';
import { buildHealthReport } from './_lib/healthCheck.js';

/**
 * GET /api/health - service status plus the state of this instance's index cache
 */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  try {
    const services = getQueryServices();
    setCorsHeaders(req, res, services.allowedOrigin);

    if (req.method === 'OPTIONS') {
      return handleOptionsRequest(res);
    }

    if (req.method !== 'GET') {
      return res.status(405).json({ error: 'Method not allowed' });
    }

    res.json(buildHealthReport(services.indexCache));
  } catch (error) {
    handleError(res, error);
  }
}
