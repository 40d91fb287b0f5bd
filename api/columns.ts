// api/columns.ts
// GET /api/columns?table_ref=...
// Columns of a stored (cleaned master) table that can be used as lookup value columns.

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { createBlobEtlService } from '../engine/etlService';
import { logAndMapError, methodNotAllowed } from '../engine/httpErrors';
import { logWarn } from '../engine/logger';
import { queryToBody, validateTableRefRequest } from '../engine/validateRequest';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'GET') {
    res.setHeader('Allow', 'GET');
    logWarn('method_not_allowed', { endpoint: 'columns', method: req.method });
    const { status, body } = methodNotAllowed('GET');
    return res.status(status).json(body);
  }

  const request = validateTableRefRequest(queryToBody(req.query));
  if (!request.ok) {
    return res.status(request.errorStatus).json(request.errorBody);
  }

  try {
    const service = createBlobEtlService();
    const columns = await service.lookupColumns(request.value.table_ref);
    return res.status(200).json({ table_ref: request.value.table_ref, columns });
  } catch (err) {
    const { status, body } = logAndMapError('columns', err);
    return res.status(status).json(body);
  }
}
