import { Estimate } from '../types';
import { analyzeEstimateWithGemini } from './geminiService';

export type Analyzer = (input: Estimate['input'], result: Estimate['result']) => Promise<string>;

/**
 * Hands out tickets for AI reviews. A review only applies while its ticket is
 * the latest one; recalculating or resetting the form invalidates it.
 */
export interface AnalysisGate {
  begin(): number;
  invalidate(): void;
  isCurrent(ticket: number): boolean;
}

export const createAnalysisGate = (): AnalysisGate => {
  let latest = 0;
  return {
    begin: () => ++latest,
    invalidate: () => {
      latest++;
    },
    isCurrent: ticket => ticket === latest
  };
};

// Resolves to null when the estimate changed while the review was running
export const requestAnalysis = async (
  gate: AnalysisGate,
  estimate: Estimate,
  analyze: Analyzer = analyzeEstimateWithGemini
): Promise<string | null> => {
  const ticket = gate.begin();
  const text = await analyze(estimate.input, estimate.result);
  return gate.isCurrent(ticket) ? text : null;
};
