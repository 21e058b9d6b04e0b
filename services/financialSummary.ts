import { EstimatorInput, EstimatorResult, HeadlineMetric, MonthlyBreakdown, SummaryRow } from '../types';
import { DAYS_PER_YEAR, LIFETIME_YEARS, MONTH_LABELS } from '../constants';
import { formatInr, formatKwh, formatNumber } from './formatters';

export const buildHeadlineMetrics = (result: EstimatorResult): HeadlineMetric[] => [
  {
    id: 'output',
    label: 'Annual Output',
    icon: 'fa-bolt',
    value: formatKwh(result.annualOutputKwh),
    delta: `${formatNumber(result.annualOutputKwh / DAYS_PER_YEAR, 1)} kWh/day`
  },
  {
    id: 'savings',
    label: 'Annual Savings',
    icon: 'fa-indian-rupee-sign',
    value: formatInr(result.annualSavings),
    delta: `${formatInr(result.annualSavings / 12)}/month`
  },
  {
    id: 'payback',
    label: 'Payback Period',
    icon: 'fa-hourglass-half',
    value: result.paybackYears > 0 ? `${result.paybackYears.toFixed(1)} years` : 'Never',
    delta: result.paybackYears > 0 ? 'ROI Timeline' : 'Maintenance exceeds savings'
  },
  {
    id: 'co2',
    label: 'CO₂ Reduction',
    icon: 'fa-leaf',
    value: `${formatNumber(result.co2ReductionKg)} kg/year`,
    delta: 'Environmental Impact'
  }
];

export const buildMonthlyBreakdown = (result: EstimatorResult, tariffPerKwh: number): MonthlyBreakdown[] =>
  result.monthlyOutputKwh.map((output, idx) => ({
    monthName: MONTH_LABELS[idx],
    output,
    savings: output * tariffPerKwh
  }));

export const lifetimeSavings = (result: EstimatorResult, years = LIFETIME_YEARS): number =>
  result.netAnnualSavings * years - result.totalSystemCost;

export const buildFinancialSummary = (input: EstimatorInput, result: EstimatorResult): SummaryRow[] => [
  { parameter: 'System Size (kW)', value: (result.annualOutputKwh / 1000).toFixed(1) },
  { parameter: 'Total Installation Cost (₹)', value: formatInr(result.totalSystemCost) },
  { parameter: 'Annual Energy Output (kWh)', value: formatNumber(result.annualOutputKwh) },
  { parameter: 'Annual Savings (₹)', value: formatInr(result.annualSavings) },
  { parameter: 'Annual Maintenance (₹)', value: formatInr(input.annualMaintenanceCost) },
  { parameter: 'Net Annual Benefit (₹)', value: formatInr(result.netAnnualSavings) },
  { parameter: 'Payback Period (years)', value: result.paybackYears.toFixed(1) },
  { parameter: `${LIFETIME_YEARS}-Year Total Savings (₹)`, value: formatInr(lifetimeSavings(result)) }
];
