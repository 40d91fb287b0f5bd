// api/suggestColumn.ts
// POST /api/suggestColumn
// Body: { header: string, candidates: string[], limit?: number }
// Ranks candidate headers; the caller decides which one to use.

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { createBlobEtlService } from '../engine/etlService';
import { logAndMapError, methodNotAllowed } from '../engine/httpErrors';
import { logWarn } from '../engine/logger';
import { parseJsonBody, validateSuggestColumnRequest } from '../engine/validateRequest';

export default function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    res.setHeader('Allow', 'POST');
    logWarn('method_not_allowed', { endpoint: 'suggestColumn', method: req.method });
    const { status, body } = methodNotAllowed('POST');
    return res.status(status).json(body);
  }

  const parsed = parseJsonBody(req.body);
  if (!parsed.ok) {
    return res.status(parsed.errorStatus).json(parsed.errorBody);
  }
  const request = validateSuggestColumnRequest(parsed.value);
  if (!request.ok) {
    return res.status(request.errorStatus).json(request.errorBody);
  }

  try {
    const service = createBlobEtlService();
    const suggestions = service.suggestColumn(
      request.value.header,
      request.value.candidates,
      request.value.limit
    );
    return res.status(200).json({
      header: request.value.header,
      suggestions,
      best: suggestions.length > 0 && suggestions[0].score > 0 ? suggestions[0].candidate : null
    });
  } catch (err) {
    const { status, body } = logAndMapError('suggestColumn', err);
    return res.status(status).json(body);
  }
}
