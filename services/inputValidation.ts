import { EstimatorDraft, EstimatorInput, InputFieldSpec, ValidationResult } from '../types';
import { INPUT_FIELDS } from '../constants';

export const defaultDraft = (): EstimatorDraft => ({
  rooftopAreaM2: String(fieldSpec('rooftopAreaM2').defaultValue),
  irradianceKwhPerM2PerDay: String(fieldSpec('irradianceKwhPerM2PerDay').defaultValue),
  tariffPerKwh: String(fieldSpec('tariffPerKwh').defaultValue),
  panelEfficiencyPct: String(fieldSpec('panelEfficiencyPct').defaultValue),
  systemLossesPct: String(fieldSpec('systemLossesPct').defaultValue),
  installationCostPerKw: String(fieldSpec('installationCostPerKw').defaultValue),
  annualMaintenanceCost: String(fieldSpec('annualMaintenanceCost').defaultValue)
});

export const fieldSpec = (field: keyof EstimatorInput): InputFieldSpec => {
  const spec = INPUT_FIELDS.find(f => f.field === field);
  if (!spec) throw new Error(`Unknown estimator field: ${field}`);
  return spec;
};

// Accepts "65,000" and surrounding whitespace; anything else non-numeric is null
const parseNumber = (value: string): number | null => {
  const cleaned = value.trim().replace(/,/g, '');
  if (!/^-?\d+(?:\.\d+)?$/.test(cleaned)) return null;

  const num = Number(cleaned);
  return Number.isFinite(num) ? num : null;
};

const describeRange = (spec: InputFieldSpec): string =>
  `${spec.min.toLocaleString('en-US')} and ${spec.max.toLocaleString('en-US')} ${spec.unit}`;

export const validateEstimatorDraft = (draft: EstimatorDraft): ValidationResult => {
  const errors: string[] = [];
  const values: Partial<Record<keyof EstimatorInput, number>> = {};

  for (const spec of INPUT_FIELDS) {
    const raw = draft[spec.field];
    const value = parseNumber(raw);

    if (value === null) {
      errors.push(raw.trim() === ''
        ? `${spec.label} is required.`
        : `${spec.label} must be a number (got "${raw.trim()}").`);
      continue;
    }
    if (value < spec.min || value > spec.max) {
      errors.push(`${spec.label} must be between ${describeRange(spec)}.`);
      continue;
    }
    values[spec.field] = value;
  }

  const {
    rooftopAreaM2,
    irradianceKwhPerM2PerDay,
    tariffPerKwh,
    panelEfficiencyPct,
    systemLossesPct,
    installationCostPerKw,
    annualMaintenanceCost
  } = values;

  if (
    errors.length > 0 ||
    rooftopAreaM2 === undefined ||
    irradianceKwhPerM2PerDay === undefined ||
    tariffPerKwh === undefined ||
    panelEfficiencyPct === undefined ||
    systemLossesPct === undefined ||
    installationCostPerKw === undefined ||
    annualMaintenanceCost === undefined
  ) {
    return { input: null, errors };
  }

  return {
    input: {
      rooftopAreaM2,
      irradianceKwhPerM2PerDay,
      tariffPerKwh,
      panelEfficiencyPct,
      systemLossesPct,
      installationCostPerKw,
      annualMaintenanceCost
    },
    errors
  };
};
