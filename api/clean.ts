// api/clean.ts
// POST /api/clean
// Body: { file_ref, sheet, key_column, text_columns?, move_key_first? }
// Cleans one sheet and stores the result; returns its table_ref and the cleaning report.

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { createBlobEtlService } from '../engine/etlService';
import { logAndMapError, methodNotAllowed } from '../engine/httpErrors';
import { logWarn } from '../engine/logger';
import { parseJsonBody, validateCleanRequest } from '../engine/validateRequest';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    res.setHeader('Allow', 'POST');
    logWarn('method_not_allowed', { endpoint: 'clean', method: req.method });
    const { status, body } = methodNotAllowed('POST');
    return res.status(status).json(body);
  }

  const parsed = parseJsonBody(req.body);
  if (!parsed.ok) {
    return res.status(parsed.errorStatus).json(parsed.errorBody);
  }
  const request = validateCleanRequest(parsed.value);
  if (!request.ok) {
    return res.status(request.errorStatus).json(request.errorBody);
  }

  const { file_ref, sheet, key_column, text_columns, move_key_first } = request.value;

  try {
    const service = createBlobEtlService();
    const outcome = await service.clean(file_ref, sheet, key_column, {
      textColumns: text_columns,
      moveKeyFirst: move_key_first
    });

    return res.status(200).json({
      table_ref: outcome.tableRef,
      columns: outcome.columns,
      shape: outcome.shape,
      report: outcome.report,
      preview: outcome.preview
    });
  } catch (err) {
    const { status, body } = logAndMapError('clean', err);
    return res.status(status).json(body);
  }
}
