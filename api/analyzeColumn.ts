// api/analyzeColumn.ts
// POST /api/analyzeColumn
// Body: { table_ref, column, target_ref?, key_column? }
// Value distribution of one column of a stored table. With target_ref and
// key_column, table_ref is the master and only rows the target never
// references are counted.

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { createBlobEtlService } from '../engine/etlService';
import { logAndMapError, methodNotAllowed } from '../engine/httpErrors';
import { logWarn } from '../engine/logger';
import { parseJsonBody, validateAnalyzeColumnRequest } from '../engine/validateRequest';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    res.setHeader('Allow', 'POST');
    logWarn('method_not_allowed', { endpoint: 'analyzeColumn', method: req.method });
    const { status, body } = methodNotAllowed('POST');
    return res.status(status).json(body);
  }

  const parsed = parseJsonBody(req.body);
  if (!parsed.ok) {
    return res.status(parsed.errorStatus).json(parsed.errorBody);
  }
  const request = validateAnalyzeColumnRequest(parsed.value);
  if (!request.ok) {
    return res.status(request.errorStatus).json(request.errorBody);
  }

  try {
    const service = createBlobEtlService();
    const { table_ref, column, target_ref, key_column } = request.value;
    const filter = target_ref && key_column ? { targetTableRef: target_ref, keyColumn: key_column } : undefined;
    const profile = await service.analyzeColumn(table_ref, column, filter);

    return res.status(200).json({
      column: profile.column,
      total_rows: profile.totalRows,
      distinct_values: profile.distinctValues,
      empty_count: profile.emptyCount,
      ...('masterRows' in profile ? { master_rows: profile.masterRows } : {}),
      values: profile.values
    });
  } catch (err) {
    const { status, body } = logAndMapError('analyzeColumn', err);
    return res.status(status).json(body);
  }
}
