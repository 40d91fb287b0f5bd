// api/previewUpdates.ts
// POST /api/previewUpdates
// Body: { master_ref, target_ref, key_column, value_columns[] }
// Dry run of /api/processUpdates: counts, sample rows and KPIs. Nothing is stored.

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { createBlobEtlService } from '../engine/etlService';
import { logAndMapError, methodNotAllowed } from '../engine/httpErrors';
import { logWarn } from '../engine/logger';
import { parseJsonBody, validateLookupRequest } from '../engine/validateRequest';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    res.setHeader('Allow', 'POST');
    logWarn('method_not_allowed', { endpoint: 'previewUpdates', method: req.method });
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
    const preview = await service.previewUpdates(master_ref, target_ref, key_column, value_columns);

    return res.status(200).json({
      inserted_count: preview.stats.insertedCount,
      unchanged_count: preview.stats.unchangedCount,
      duplicates_count: preview.stats.duplicatesCount,
      skipped_count: preview.stats.skippedCount,
      risk_level: preview.kpi.riskLevel,
      kpi: preview.kpi,
      inserted: preview.inserted,
      duplicates: preview.duplicates
    });
  } catch (err) {
    const { status, body } = logAndMapError('previewUpdates', err);
    return res.status(status).json(body);
  }
}
