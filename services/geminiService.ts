import { GoogleGenAI } from "@google/genai";
import { EstimatorInput, EstimatorResult } from "../types";
import { formatInr, formatNumber } from "./formatters";
import { lifetimeSavings } from "./financialSummary";

export const ADVISOR_MODEL = "gemini-2.5-flash";

export const MISSING_KEY_MESSAGE =
  "AI review requires a Gemini API key. Set VITE_GEMINI_API_KEY in your environment. The calculator works without it.";

export const buildAdvisorPrompt = (input: EstimatorInput, result: EstimatorResult): string => `Review this rooftop solar estimate for a homeowner or small business in India.

System inputs:
- Rooftop area: ${input.rooftopAreaM2} m²
- Solar irradiance: ${input.irradianceKwhPerM2PerDay} kWh/m²/day
- Electricity tariff: ₹${input.tariffPerKwh}/kWh
- Panel efficiency: ${input.panelEfficiencyPct}%, system losses: ${input.systemLossesPct}%
- Installation cost: ${formatInr(input.installationCostPerKw)}/kW, maintenance: ${formatInr(input.annualMaintenanceCost)}/year

Estimated results:
- Annual output: ${formatNumber(result.annualOutputKwh)} kWh
- Total system cost: ${formatInr(result.totalSystemCost)}
- Net annual benefit: ${formatInr(result.netAnnualSavings)}
- Payback: ${result.paybackYears > 0 ? `${result.paybackYears.toFixed(1)} years` : "never (maintenance exceeds savings)"}
- 25-year total savings: ${formatInr(lifetimeSavings(result))}
- CO₂ avoided: ${formatNumber(result.co2ReductionKg)} kg/year

Please provide:
1. **VERDICT**: One sentence on whether this installation looks worthwhile.
2. **SENSITIVITIES**: Which two inputs move the payback most, and by roughly how much.
3. **NEXT STEPS**: Quick, practical checks before requesting installer quotes.

Keep the response concise. Use bullet points.`;

export const analyzeEstimateWithGemini = async (
  input: EstimatorInput,
  result: EstimatorResult,
  apiKey: string = import.meta.env.VITE_GEMINI_API_KEY ?? ''
): Promise<string> => {
  if (!apiKey) {
    return MISSING_KEY_MESSAGE;
  }

  try {
    const ai = new GoogleGenAI({ apiKey });
    const response = await ai.models.generateContent({
      model: ADVISOR_MODEL,
      contents: buildAdvisorPrompt(input, result),
      config: {
        thinkingConfig: { thinkingBudget: 1024 }
      }
    });

    return response.text || "Unable to generate analysis at this time.";
  } catch (error) {
    console.error("Gemini Analysis Error:", error);
    return "Error communicating with the AI analyst. Please try again later.";
  }
};
