// api/sheets.ts
// POST /api/sheets
// Body: { file_ref: string, preview_rows?: number }
// Lists the sheets of an uploaded .csv/.xlsx file with a row preview per sheet.

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { createBlobEtlService } from '../engine/etlService';
import { logAndMapError, methodNotAllowed } from '../engine/httpErrors';
import { logWarn } from '../engine/logger';
import { parseJsonBody, validateSheetsRequest } from '../engine/validateRequest';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    res.setHeader('Allow', 'POST');
    logWarn('method_not_allowed', { endpoint: 'sheets', method: req.method });
    const { status, body } = methodNotAllowed('POST');
    return res.status(status).json(body);
  }

  const parsed = parseJsonBody(req.body);
  if (!parsed.ok) {
    return res.status(parsed.errorStatus).json(parsed.errorBody);
  }
  const request = validateSheetsRequest(parsed.value);
  if (!request.ok) {
    return res.status(request.errorStatus).json(request.errorBody);
  }

  try {
    const service = createBlobEtlService();
    const sheets = await service.listSheets(request.value.file_ref, request.value.preview_rows);

    return res.status(200).json({
      file_ref: request.value.file_ref,
      sheet_names: sheets.map((s) => s.name),
      sheets
    });
  } catch (err) {
    const { status, body } = logAndMapError('sheets', err);
    return res.status(status).json(body);
  }
}
