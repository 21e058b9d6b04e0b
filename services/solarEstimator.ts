import { EstimatorInput, EstimatorResult, CumulativeSavingsPoint } from '../types';
import {
  CO2_KG_PER_KWH,
  DAYS_PER_YEAR,
  MIN_ROI_TIMELINE_YEARS,
  REFERENCE_PANEL_EFFICIENCY_PCT,
  ROI_TIMELINE_EXTRA_YEARS,
  SEASONAL_FACTORS
} from '../constants';

/**
 * Single-pass estimate of output, savings, payback and CO2 for one rooftop.
 *
 * Inputs are assumed to be range-checked already (see inputValidation).
 * System size in kW is approximated as annual kWh / 1000, not rated capacity.
 */
export const estimate = (input: EstimatorInput): EstimatorResult => {
  const performanceRatio = (100 - input.systemLossesPct) / 100;
  const annualOutputKwh =
    input.rooftopAreaM2 *
    input.irradianceKwhPerM2PerDay *
    DAYS_PER_YEAR *
    performanceRatio *
    (input.panelEfficiencyPct / REFERENCE_PANEL_EFFICIENCY_PCT);

  const annualSavings = annualOutputKwh * input.tariffPerKwh;
  const totalSystemCost = (annualOutputKwh / 1000) * input.installationCostPerKw;
  const netAnnualSavings = annualSavings - input.annualMaintenanceCost;
  const paybackYears = netAnnualSavings > 0 ? totalSystemCost / netAnnualSavings : 0;
  const co2ReductionKg = annualOutputKwh * CO2_KG_PER_KWH;

  const monthlyOutputKwh = SEASONAL_FACTORS.map(factor => (annualOutputKwh / 12) * factor);

  // Never fewer than MIN_ROI_TIMELINE_YEARS points, even with the 0 sentinel
  const years = Math.max(MIN_ROI_TIMELINE_YEARS, Math.floor(paybackYears) + ROI_TIMELINE_EXTRA_YEARS);
  const cumulativeSavingsByYear: CumulativeSavingsPoint[] = [];
  for (let year = 1; year <= years; year++) {
    cumulativeSavingsByYear.push({
      year,
      cumulativeSavings: year * netAnnualSavings - totalSystemCost
    });
  }

  return {
    performanceRatio,
    annualOutputKwh,
    annualSavings,
    totalSystemCost,
    netAnnualSavings,
    paybackYears,
    co2ReductionKg,
    monthlyOutputKwh,
    cumulativeSavingsByYear
  };
};
