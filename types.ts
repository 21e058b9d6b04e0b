export interface EstimatorInput {
  readonly rooftopAreaM2: number;
  readonly irradianceKwhPerM2PerDay: number;
  readonly tariffPerKwh: number;           // ₹ per kWh
  readonly panelEfficiencyPct: number;
  readonly systemLossesPct: number;
  readonly installationCostPerKw: number;  // ₹ per kW
  readonly annualMaintenanceCost: number;  // ₹ per year
}

export type EstimatorField = keyof EstimatorInput;

// Raw form values, one string per field
export type EstimatorDraft = Record<EstimatorField, string>;

export interface CumulativeSavingsPoint {
  readonly year: number;
  readonly cumulativeSavings: number;
}

export interface EstimatorResult {
  readonly performanceRatio: number;
  readonly annualOutputKwh: number;
  readonly annualSavings: number;
  readonly totalSystemCost: number;
  readonly netAnnualSavings: number;
  // 0 when the system never pays back
  readonly paybackYears: number;
  readonly co2ReductionKg: number;
  readonly monthlyOutputKwh: readonly number[];
  readonly cumulativeSavingsByYear: readonly CumulativeSavingsPoint[];
}

export interface InputFieldSpec {
  field: EstimatorField;
  label: string;
  unit: string;
  icon: string;
  help: string;
  min: number;
  max: number;
  step: number;
  defaultValue: number;
  control: 'number' | 'slider';
  advanced: boolean;
}

export interface ValidationResult {
  input: EstimatorInput | null;
  errors: string[];
}

export interface MonthlyBreakdown {
  monthName: string;
  output: number;   // kWh
  savings: number;  // ₹
}

export type PotentialBand = 'low' | 'moderate' | 'high';

export interface HeadlineMetric {
  id: 'output' | 'savings' | 'payback' | 'co2';
  label: string;
  icon: string;
  value: string;
  delta: string;
}

export interface SummaryRow {
  parameter: string;
  value: string;
}

export interface IrradianceRegion {
  region: string;
  irradiance: number; // kWh/m²/day
  potential: 'Excellent' | 'Very Good' | 'Good' | 'Moderate';
}

export interface TipSection {
  id: string;
  title: string;
  icon: string;
  tips: { heading: string; detail: string }[];
}

// One request/response pair from the form; the estimator itself keeps nothing
export interface Estimate {
  input: EstimatorInput;
  result: EstimatorResult;
}
