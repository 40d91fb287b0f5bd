// api/export.ts
// GET /api/export?table_ref=...&format=csv|xlsx
// Streams a stored table back as a file download.

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { createBlobEtlService } from '../engine/etlService';
import { logAndMapError, methodNotAllowed } from '../engine/httpErrors';
import { logWarn } from '../engine/logger';
import { queryToBody, validateExportRequest } from '../engine/validateRequest';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'GET') {
    res.setHeader('Allow', 'GET');
    logWarn('method_not_allowed', { endpoint: 'export', method: req.method });
    const { status, body } = methodNotAllowed('GET');
    return res.status(status).json(body);
  }

  const request = validateExportRequest(queryToBody(req.query));
  if (!request.ok) {
    return res.status(request.errorStatus).json(request.errorBody);
  }

  try {
    const service = createBlobEtlService();
    const file = await service.exportTable(request.value.table_ref, request.value.format);

    res.setHeader('Content-Type', file.contentType);
    res.setHeader('Content-Disposition', `attachment; filename="${file.fileName}"`);
    return res.status(200).send(file.bytes);
  } catch (err) {
    const { status, body } = logAndMapError('export', err);
    return res.status(status).json(body);
  }
}
