// api/lookup.ts
// POST /api/lookup
// Body: { master_ref, target_ref, key_column, value_columns[] }
// Runs the lookup of a cleaned target table against a cleaned master table.

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { createBlobEtlService } from '../engine/etlService';
import { logAndMapError, methodNotAllowed } from '../engine/httpErrors';
import { logWarn } from '../engine/logger';
import { parseJsonBody, validateLookupRequest } from '../engine/validateRequest';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    res.setHeader('Allow', 'POST');
    logWarn('method_not_allowed', { endpoint: 'lookup', method: req.method });
    const { status, body } = methodNotAllowed('POST');
    return res.status(status).json(body);
  }

  const parsed = parseJsonBody(req.body);
  if (!parsed.ok) {
    return res.status(parsed.errorStatus).json(parsed.errorBody);
  }
  const request = validateLookupRequest(parsed.value);
  if (!request.ok) {
    return res.status(request.errorStatus).json(request.errorBody);
  }

  const { master_ref, target_ref, key_column, value_columns } = request.value;

  try {
    const service = createBlobEtlService();
    const outcome = await service.lookup(master_ref, target_ref, key_column, value_columns);

    return res.status(200).json({
      table_ref: outcome.tableRef,
      columns: outcome.columns,
      kpi: outcome.kpi,
      master_duplicate_keys: outcome.masterDuplicateKeys,
      preview: outcome.preview,
      download_path: outcome.downloadPath
    });
  } catch (err) {
    const { status, body } = logAndMapError('lookup', err);
    return res.status(status).json(body);
  }
}
