import { describe, it, expect } from 'vitest';
import { buildFinancialSummary, buildHeadlineMetrics, buildMonthlyBreakdown, lifetimeSavings } from '../financialSummary';
import { estimate } from '../solarEstimator';
import { EstimatorInput } from '../../types';

const typicalHome: EstimatorInput = {
  rooftopAreaM2: 100,
  irradianceKwhPerM2PerDay: 5.5,
  tariffPerKwh: 6.5,
  panelEfficiencyPct: 20,
  systemLossesPct: 15,
  installationCostPerKw: 65000,
  annualMaintenanceCost: 4000,
};

describe('buildHeadlineMetrics', () => {
  const metrics = buildHeadlineMetrics(estimate(typicalHome));

  it('shows output with a daily delta', () => {
    expect(metrics[0]).toMatchObject({ id: 'output', value: '170,638 kWh', delta: '467.5 kWh/day' });
  });

  it('shows savings with a monthly delta', () => {
    expect(metrics[1]).toMatchObject({ id: 'savings', value: '₹1,109,144', delta: '₹92,429/month' });
  });

  it('shows payback and CO2', () => {
    expect(metrics[2]).toMatchObject({ id: 'payback', value: '10.0 years', delta: 'ROI Timeline' });
    expect(metrics[3]).toMatchObject({ id: 'co2', value: '139,923 kg/year' });
  });

  it('labels the no-payback sentinel', () => {
    const sentinel = buildHeadlineMetrics(estimate({ ...typicalHome, tariffPerKwh: 0.01, annualMaintenanceCost: 8000 }));
    expect(sentinel[2]).toMatchObject({ value: 'Never', delta: 'Maintenance exceeds savings' });
  });
});

describe('buildMonthlyBreakdown', () => {
  it('pairs each month with output and savings at the tariff', () => {
    const months = buildMonthlyBreakdown(estimate(typicalHome), 6.5);
    expect(months).toHaveLength(12);
    expect(months[0].monthName).toBe('Jan');
    expect(months[11].monthName).toBe('Dec');
    expect(months[0].output).toBeCloseTo((170637.5 / 12) * 0.8, 6);
    expect(months[0].savings).toBeCloseTo((170637.5 / 12) * 0.8 * 6.5, 4);
  });
});

describe('lifetimeSavings', () => {
  it('subtracts system cost from accumulated net savings', () => {
    expect(lifetimeSavings(estimate(typicalHome), 10)).toBeCloseTo(-40000, 2);
    expect(lifetimeSavings(estimate(typicalHome))).toBeCloseTo(16537156.25, 2);
  });
});

describe('buildFinancialSummary', () => {
  const rows = buildFinancialSummary(typicalHome, estimate(typicalHome));
  const valueOf = (parameter: string) => rows.find(r => r.parameter === parameter)?.value;

  it('lists eight rows in table order', () => {
    expect(rows.map(r => r.parameter)).toEqual([
      'System Size (kW)',
      'Total Installation Cost (₹)',
      'Annual Energy Output (kWh)',
      'Annual Savings (₹)',
      'Annual Maintenance (₹)',
      'Net Annual Benefit (₹)',
      'Payback Period (years)',
      '25-Year Total Savings (₹)',
    ]);
  });

  it('formats each value', () => {
    expect(valueOf('System Size (kW)')).toBe('170.6');
    expect(valueOf('Total Installation Cost (₹)')).toMatch(/^₹11,091,43[78]$/);
    expect(valueOf('Annual Energy Output (kWh)')).toBe('170,638');
    expect(valueOf('Annual Savings (₹)')).toBe('₹1,109,144');
    expect(valueOf('Annual Maintenance (₹)')).toBe('₹4,000');
    expect(valueOf('Net Annual Benefit (₹)')).toBe('₹1,105,144');
    expect(valueOf('Payback Period (years)')).toBe('10.0');
    expect(valueOf('25-Year Total Savings (₹)')).toBe('₹16,537,156');
  });
});
