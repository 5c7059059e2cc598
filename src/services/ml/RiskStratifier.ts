import { RiskLevel } from '../../types/models';

export const RISK_LEVEL_THRESHOLDS = {
  medium: 0.3,
  high: 0.7
} as const;

// Lower bound of each band, ascending; a probability belongs to the last band whose bound it reaches
const INTERPRETATION_BANDS: ReadonlyArray<{ from: number; text: string }> = [
  { from: 0.0, text: 'Very low risk of neurodevelopmental disorders' },
  { from: 0.2, text: 'Low risk of neurodevelopmental disorders' },
  { from: 0.4, text: 'Moderate risk of neurodevelopmental disorders' },
  { from: 0.6, text: 'High risk of neurodevelopmental disorders' },
  { from: 0.8, text: 'Very high risk of neurodevelopmental disorders' }
];

export const INTERPRETATIONS: readonly string[] = INTERPRETATION_BANDS.map(band => band.text);

export function riskLevelFor(probability: number): RiskLevel {
  if (probability < RISK_LEVEL_THRESHOLDS.medium) return 'Low';
  if (probability < RISK_LEVEL_THRESHOLDS.high) return 'Medium';
  return 'High';
}

export function interpretationFor(probability: number): string {
  let text = INTERPRETATION_BANDS[0].text;
  for (const band of INTERPRETATION_BANDS) {
    if (probability >= band.from) {
      text = band.text;
    }
  }
  return text;
}

/**
 * Map a probability to its risk level and interpretation. Boundary values fall
 * in the upper band; values outside [0, 1] land in the first or last band.
 */
export function stratify(probability: number): { riskLevel: RiskLevel; interpretation: string } {
  return {
    riskLevel: riskLevelFor(probability),
    interpretation: interpretationFor(probability)
  };
}
