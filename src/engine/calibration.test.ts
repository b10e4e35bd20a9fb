import { describe, expect, it } from 'vitest';
import { baseConfig } from '../config/baseConfig';
import type { RunSummary } from '../domain/results';
import { compareWithAnchors, formatCalibrationReport } from './calibration';
import { baselineLevels } from './market';

const summary = (overrides: Partial<RunSummary> = {}): RunSummary => ({
  totalAgents: 10,
  horizonDays: 5,
  agentsReactedFinalDay: 2,
  agentsEverReacted: 4,
  totalMarginCalls: 60000,
  nbfiMarginCalls: 47000,
  totalAssetSales: 9000,
  nbfiGiltSales: 4700,
  totalRepoDemand: 3000,
  totalRedemptions: 100,
  ldiRecapitalisation: 0,
  hedgeFundsSeekingRepo: 4,
  hedgeFundsRefusedByAll: 2,
  repoRefusalRate: 0.5,
  bankGiltCapacityConsumedPct: 0.35,
  finalLevels: baselineLevels(baseConfig.market),
  finalRepoAvailability: 0.8,
  ...overrides,
});

describe('compareWithAnchors', () => {
  it('converts amounts to £bn and fractions to percentage points', () => {
    const checks = compareWithAnchors(summary(), baseConfig.anchors);
    expect(checks.map((c) => c.id)).toEqual([
      'nbfiMarginCallsBn',
      'ldiRecapitalisationBn',
      'nbfiGiltSalesBn',
      'bankGiltCapacityConsumedPct',
      'nbfiRepoRefusalPct',
    ]);
    expect(checks[0]).toMatchObject({ model: 47, target: 94, deviation: -0.5 });
    expect(checks[1]).toMatchObject({ model: 0, target: 16.5, deviation: -1 });
    expect(checks[2].deviation).toBeCloseTo(0, 12);
    expect(checks[3].model).toBeCloseTo(35, 12);
    expect(checks[3].deviation).toBeCloseTo(-0.5, 12);
  });

  it('leaves the deviation undefined for a zero target', () => {
    const [check] = compareWithAnchors(summary(), { ...baseConfig.anchors, nbfiMarginCallsBn: 0 });
    expect(check.deviation).toBeNaN();
  });
});

describe('formatCalibrationReport', () => {
  it('prints one line per anchor', () => {
    const lines = formatCalibrationReport(compareWithAnchors(summary(), baseConfig.anchors)).split('\n');
    expect(lines).toHaveLength(5);
    expect(lines[0]).toBe('Non-bank margin calls: model £47.0bn vs target £94.0bn (-50.0%)');
    expect(lines[4]).toBe('Hedge fund repo refusal rate: model 50.0% vs target 33.0% (+51.5%)');
  });

  it('marks a missing deviation as not available', () => {
    const report = formatCalibrationReport(
      compareWithAnchors(summary(), { ...baseConfig.anchors, nbfiMarginCallsBn: 0 })
    );
    expect(report.split('\n')[0]).toBe('Non-bank margin calls: model £47.0bn vs target £0.0bn (N/A)');
  });
});
