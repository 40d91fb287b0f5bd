// engine/kpiSummary.ts
// KPI snapshot for one lookup run.

import { DEFAULT_RISK_THRESHOLDS, type RiskThresholds } from './config';
import type { ClassificationCounts, KpiSnapshot, RiskLevel, RowClassification } from './types';

export interface SummarizeOptions {
  thresholds?: Partial<RiskThresholds>;
  /** Secondary metric from LookupResult; not part of any rate. */
  unreferencedMasterRows?: number;
}

function rate(count: number, total: number): number {
  return total === 0 ? 0 : count / total;
}

function percentage(count: number, total: number): number {
  return total === 0 ? 0 : Math.round((count / total) * 10000) / 100;
}

export function deriveRiskLevel(
  rates: { duplicateRate: number; updateRate: number; insertRate: number },
  thresholds: RiskThresholds = DEFAULT_RISK_THRESHOLDS
): RiskLevel {
  if (rates.duplicateRate > thresholds.highDuplicateRate || rates.updateRate > thresholds.highUpdateRate) {
    return 'HIGH';
  }
  if (rates.duplicateRate > thresholds.mediumDuplicateRate || rates.insertRate > thresholds.mediumInsertRate) {
    return 'MEDIUM';
  }
  return 'LOW';
}

/**
 * Counts, rates and risk level of a classification sequence.
 * UNKEYED rows are counted but never part of a denominator.
 */
export function summarizeLookup(
  classifications: readonly RowClassification[],
  options: SummarizeOptions = {}
): KpiSnapshot {
  const thresholds: RiskThresholds = { ...DEFAULT_RISK_THRESHOLDS, ...options.thresholds };

  const counts: ClassificationCounts = {
    MATCH: 0,
    UPDATE: 0,
    INSERT: 0,
    DUPLICATE: 0,
    UNKEYED: 0
  };
  for (const c of classifications) {
    counts[c] += 1;
  }

  const classifiedTotal = counts.MATCH + counts.UPDATE + counts.INSERT + counts.DUPLICATE;
  const matchRate = rate(counts.MATCH, classifiedTotal);
  const updateRate = rate(counts.UPDATE, classifiedTotal);
  const insertRate = rate(counts.INSERT, classifiedTotal);
  const duplicateRate = rate(counts.DUPLICATE, classifiedTotal);

  const snapshot: KpiSnapshot = {
    counts: Object.freeze(counts),
    classifiedTotal,
    unkeyedCount: counts.UNKEYED,
    matchRate,
    updateRate,
    insertRate,
    duplicateRate,
    percentages: Object.freeze({
      MATCH: percentage(counts.MATCH, classifiedTotal),
      UPDATE: percentage(counts.UPDATE, classifiedTotal),
      INSERT: percentage(counts.INSERT, classifiedTotal),
      DUPLICATE: percentage(counts.DUPLICATE, classifiedTotal)
    }),
    unreferencedMasterRows: options.unreferencedMasterRows ?? 0,
    riskLevel: deriveRiskLevel({ duplicateRate, updateRate, insertRate }, thresholds)
  };

  return Object.freeze(snapshot);
}
