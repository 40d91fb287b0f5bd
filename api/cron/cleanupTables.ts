// api/cron/cleanupTables.ts
// Purpose: Delete stored intermediate tables older than BOM_TABLE_MAX_AGE_HOURS (default 24).
// Schedule: every 1 hour (via Vercel Cron)
// Supports: dry-run mode (no deletions)

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { loadEngineConfig } from '../../engine/config';
import { BlobFileStore } from '../../engine/fileStore';
import { logAndMapError, methodNotAllowed } from '../../engine/httpErrors';
import { logInfo } from '../../engine/logger';
import { cleanupStoredTables } from '../../engine/tableRetention';

function parseBool(v: unknown): boolean {
  const s = String(v ?? '').trim().toLowerCase();
  return s === '1' || s === 'true' || s === 'yes' || s === 'y';
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  // Cron calls are GET by default
  if (req.method !== 'GET') {
    res.setHeader('Allow', 'GET');
    const { status, body } = methodNotAllowed('GET');
    return res.status(status).json(body);
  }

  // Dry-run can be controlled via query or env
  const dryRun = parseBool(req.query.dry_run) || parseBool(process.env.CLEANUP_DRY_RUN);

  try {
    const config = loadEngineConfig();
    const summary = await cleanupStoredTables(new BlobFileStore({ token: config.storage.token }), {
      // Stored tables only; uploaded source files are left alone.
      prefix: config.storage.tablesPrefix,
      maxAgeHours: config.storage.maxTableAgeHours,
      dryRun
    });

    logInfo('tables_cleanup_completed', {
      dry_run: summary.dry_run,
      scanned: summary.scanned,
      eligible: summary.eligible,
      deleted: summary.deleted
    });

    return res.status(200).json({ ok: true, ...summary });
  } catch (err) {
    const { status, body } = logAndMapError('cron/cleanupTables', err);
    return res.status(status).json({ ok: false, dry_run: dryRun, ...body });
  }
}
