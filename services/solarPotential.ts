import { PotentialBand } from '../types';

// Normalized 0-100 score for the gauge; saturates for any realistic rooftop
export const solarPotentialScore = (annualOutputKwh: number, rooftopAreaM2: number): number =>
  Math.min(100, (annualOutputKwh / rooftopAreaM2) * 10);

export const potentialBand = (score: number): PotentialBand => {
  if (score < 50) return 'low';
  if (score < 80) return 'moderate';
  return 'high';
};

export const potentialBandColor: Record<PotentialBand, string> = {
  'low': '#cbd5e1',
  'moderate': '#facc15',
  'high': '#22c55e',
};

export const potentialBandLabel: Record<PotentialBand, string> = {
  'low': 'Limited',
  'moderate': 'Promising',
  'high': 'Excellent',
};
