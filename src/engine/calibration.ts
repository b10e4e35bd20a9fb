/**
 * Comparison of a run's headline numbers with published system-wide stress-exercise results.
 *
 * Amount anchors are in £bn and percentage anchors in percentage points, matching how
 * the published figures are quoted.
 */
import type { CalibrationAnchors } from '../domain/config';
import type { RunSummary } from '../domain/results';
import { formatBn, formatPct, formatSignedPct } from '../utils/formatters';

export type CalibrationUnit = 'bn' | 'pct';

export interface CalibrationCheck {
  id: keyof CalibrationAnchors;
  label: string;
  unit: CalibrationUnit;
  model: number;
  target: number;
  /** model / target - 1; NaN when the target is zero. */
  deviation: number;
}

const CHECKS: ReadonlyArray<{
  id: keyof CalibrationAnchors;
  label: string;
  unit: CalibrationUnit;
  modelOf: (summary: RunSummary) => number;
}> = [
  { id: 'nbfiMarginCallsBn', label: 'Non-bank margin calls', unit: 'bn', modelOf: (s) => s.nbfiMarginCalls / 1000 },
  {
    id: 'ldiRecapitalisationBn',
    label: 'LDI recapitalisation',
    unit: 'bn',
    modelOf: (s) => s.ldiRecapitalisation / 1000,
  },
  { id: 'nbfiGiltSalesBn', label: 'Non-bank gilt sales', unit: 'bn', modelOf: (s) => s.nbfiGiltSales / 1000 },
  {
    id: 'bankGiltCapacityConsumedPct',
    label: 'Bank gilt capacity consumed',
    unit: 'pct',
    modelOf: (s) => s.bankGiltCapacityConsumedPct * 100,
  },
  { id: 'nbfiRepoRefusalPct', label: 'Hedge fund repo refusal rate', unit: 'pct', modelOf: (s) => s.repoRefusalRate * 100 },
];

export const compareWithAnchors = (summary: RunSummary, anchors: CalibrationAnchors): CalibrationCheck[] =>
  CHECKS.map((check) => {
    const model = check.modelOf(summary);
    const target = anchors[check.id];
    return {
      id: check.id,
      label: check.label,
      unit: check.unit,
      model,
      target,
      deviation: target !== 0 ? model / target - 1 : Number.NaN,
    };
  });

const formatValue = (value: number, unit: CalibrationUnit): string =>
  unit === 'bn' ? formatBn(value * 1000, 1) : formatPct(value / 100, 1);

export const formatCalibrationReport = (checks: readonly CalibrationCheck[]): string =>
  checks
    .map(
      (check) =>
        `${check.label}: model ${formatValue(check.model, check.unit)} vs target ${formatValue(
          check.target,
          check.unit
        )} (${formatSignedPct(check.deviation, 1)})`
    )
    .join('\n');
