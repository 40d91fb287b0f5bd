// api/processUpdates.ts
// POST /api/processUpdates
// Body: { master_ref, target_ref, key_column, value_columns[] }
// Appends new keys from the target to a copy of the master table; reports duplicates.

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { createBlobEtlService } from '../engine/etlService';
import { logAndMapError, methodNotAllowed } from '../engine/httpErrors';
import { logWarn } from '../engine/logger';
import { parseJsonBody, validateLookupRequest } from '../engine/validateRequest';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    res.setHeader('Allow', 'POST');
    logWarn('method_not_allowed', { endpoint: 'processUpdates', method: req.method });
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
    const outcome = await service.processUpdates(master_ref, target_ref, key_column, value_columns);

    return res.status(200).json({
      table_ref: outcome.tableRef,
      shape: outcome.shape,
      inserted_count: outcome.stats.insertedCount,
      unchanged_count: outcome.stats.unchangedCount,
      duplicates_count: outcome.stats.duplicatesCount,
      skipped_count: outcome.stats.skippedCount,
      duplicates: outcome.duplicates,
      download_path: outcome.downloadPath
    });
  } catch (err) {
    const { status, body } = logAndMapError('processUpdates', err);
    return res.status(status).json(body);
  }
}
