import { describe, it, expect, vi, beforeEach } from 'vitest';

const { generateContent } = vi.hoisted(() => ({ generateContent: vi.fn() }));

vi.mock('@google/genai', () => ({
  GoogleGenAI: class {
    models = { generateContent };
  },
}));

import { createAnalysisGate, requestAnalysis, Analyzer } from '../analysisRequests';
import { analyzeEstimateWithGemini } from '../geminiService';
import { estimate } from '../solarEstimator';
import { Estimate, EstimatorInput } from '../../types';

// ─── Shared fixtures ──────────────────────────────────────────────────────────

const typicalHome: EstimatorInput = {
  rooftopAreaM2: 100,
  irradianceKwhPerM2PerDay: 5.5,
  tariffPerKwh: 6.5,
  panelEfficiencyPct: 20,
  systemLossesPct: 15,
  installationCostPerKw: 65000,
  annualMaintenanceCost: 4000,
};

const estimateFor = (input: EstimatorInput): Estimate => ({ input, result: estimate(input) });

const analyzeWithKey: Analyzer = (input, result) => analyzeEstimateWithGemini(input, result, 'test-key');

// ─── 1. Gate tickets ──────────────────────────────────────────────────────────

describe('createAnalysisGate', () => {
  it('keeps only the newest ticket current', () => {
    const gate = createAnalysisGate();
    const first = gate.begin();
    expect(gate.isCurrent(first)).toBe(true);

    const second = gate.begin();
    expect(gate.isCurrent(first)).toBe(false);
    expect(gate.isCurrent(second)).toBe(true);
  });

  it('invalidate retires the outstanding ticket', () => {
    const gate = createAnalysisGate();
    const ticket = gate.begin();
    gate.invalidate();
    expect(gate.isCurrent(ticket)).toBe(false);
  });
});

// ─── 2. Review requests ───────────────────────────────────────────────────────

describe('requestAnalysis', () => {
  beforeEach(() => {
    generateContent.mockReset();
  });

  it('returns the review when the estimate is unchanged', async () => {
    generateContent.mockResolvedValue({ text: 'Worth installing.' });
    const gate = createAnalysisGate();

    await expect(requestAnalysis(gate, estimateFor(typicalHome), analyzeWithKey)).resolves.toBe('Worth installing.');
  });

  it('drops a review that resolves after a recalculation', async () => {
    let respond: (value: { text: string }) => void = () => {};
    generateContent.mockReturnValue(new Promise(resolve => { respond = resolve; }));
    const gate = createAnalysisGate();

    const pending = requestAnalysis(gate, estimateFor(typicalHome), analyzeWithKey);
    // User recalculates with a new tariff while the review is in flight
    gate.invalidate();
    respond({ text: 'Review of the old numbers.' });

    await expect(pending).resolves.toBeNull();
  });

  it('drops an earlier review superseded by a newer one', async () => {
    let respondFirst: (value: { text: string }) => void = () => {};
    generateContent
      .mockReturnValueOnce(new Promise(resolve => { respondFirst = resolve; }))
      .mockResolvedValueOnce({ text: 'Review at ₹8/kWh.' });
    const gate = createAnalysisGate();

    const first = requestAnalysis(gate, estimateFor(typicalHome), analyzeWithKey);
    const second = requestAnalysis(gate, estimateFor({ ...typicalHome, tariffPerKwh: 8 }), analyzeWithKey);
    respondFirst({ text: 'Review at ₹6.5/kWh.' });

    await expect(first).resolves.toBeNull();
    await expect(second).resolves.toBe('Review at ₹8/kWh.');
  });
});
