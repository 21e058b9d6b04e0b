import { describe, it, expect } from 'vitest';
import { defaultDraft, fieldSpec, validateEstimatorDraft } from '../inputValidation';

describe('defaultDraft', () => {
  it('fills every field with its default as a string', () => {
    expect(defaultDraft()).toEqual({
      rooftopAreaM2: '100',
      irradianceKwhPerM2PerDay: '5.5',
      tariffPerKwh: '6.5',
      panelEfficiencyPct: '20',
      systemLossesPct: '15',
      installationCostPerKw: '65000',
      annualMaintenanceCost: '4000',
    });
  });
});

describe('fieldSpec', () => {
  it('returns the range for a field', () => {
    const spec = fieldSpec('systemLossesPct');
    expect(spec.min).toBe(10);
    expect(spec.max).toBe(25);
  });
});

describe('validateEstimatorDraft', () => {
  it('accepts the defaults', () => {
    const result = validateEstimatorDraft(defaultDraft());
    expect(result.errors).toEqual([]);
    expect(result.input).toEqual({
      rooftopAreaM2: 100,
      irradianceKwhPerM2PerDay: 5.5,
      tariffPerKwh: 6.5,
      panelEfficiencyPct: 20,
      systemLossesPct: 15,
      installationCostPerKw: 65000,
      annualMaintenanceCost: 4000,
    });
  });

  it('tolerates thousands separators and whitespace', () => {
    const result = validateEstimatorDraft({ ...defaultDraft(), installationCostPerKw: ' 72,500 ' });
    expect(result.input?.installationCostPerKw).toBe(72500);
  });

  it('treats range limits as inclusive', () => {
    expect(validateEstimatorDraft({ ...defaultDraft(), rooftopAreaM2: '10' }).input?.rooftopAreaM2).toBe(10);
    expect(validateEstimatorDraft({ ...defaultDraft(), rooftopAreaM2: '1000' }).input?.rooftopAreaM2).toBe(1000);
  });

  it('rejects values outside the range', () => {
    const result = validateEstimatorDraft({ ...defaultDraft(), rooftopAreaM2: '5' });
    expect(result.input).toBeNull();
    expect(result.errors).toEqual(['Rooftop Area must be between 10 and 1,000 m².']);
  });

  it('formats fractional ranges without trailing zeros', () => {
    const result = validateEstimatorDraft({ ...defaultDraft(), irradianceKwhPerM2PerDay: '7.5' });
    expect(result.errors).toEqual(['Solar Irradiance must be between 3 and 7 kWh/m²/day.']);
  });

  it('reports empty and non-numeric values', () => {
    const result = validateEstimatorDraft({ ...defaultDraft(), tariffPerKwh: '  ', panelEfficiencyPct: 'abc' });
    expect(result.input).toBeNull();
    expect(result.errors).toEqual([
      'Electricity Tariff is required.',
      'Panel Efficiency must be a number (got "abc").',
    ]);
  });

  it('rejects partially numeric text', () => {
    const result = validateEstimatorDraft({ ...defaultDraft(), annualMaintenanceCost: '4000abc' });
    expect(result.errors).toEqual(['Annual Maintenance must be a number (got "4000abc").']);
  });
});
