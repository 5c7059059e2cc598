/**
 * Core data models for the NDD risk screening service
 */

export const QUESTIONNAIRE_LENGTH = 40;

export type Sex = 'M' | 'F';

export interface Submission {
  age: number; // Whole years, 1..120
  sex: Sex;
  responses: boolean[]; // One answer per questionnaire item, in item order
  consent?: boolean;
}

export type FeatureLayout = 'compact' | 'extended';

export interface CompactFeatureVector {
  layout: 'compact';
  values: number[]; // 40 response flags
}

export interface ExtendedFeatureVector {
  layout: 'extended';
  values: number[]; // 40 response flags, age, sex flag
}

export type FeatureVector = CompactFeatureVector | ExtendedFeatureVector;

export type RiskLevel = 'Low' | 'Medium' | 'High';

export interface ModelScore {
  probability: number;
  confidence: number;
}

export interface RiskPrediction extends ModelScore {
  riskLevel: RiskLevel;
  interpretation: string;
}

export interface EvaluationDraft {
  age: number;
  sex: Sex;
  responses: boolean[];
  consent: boolean;
  probability: number;
}

export interface EvaluationRecord extends EvaluationDraft {
  id: number;
  createdAt: Date;
}

export type EvaluationSummary = Omit<EvaluationRecord, 'responses'>;

export interface EvaluationStatistics {
  totalEvaluations: number;
  riskDistribution: {
    low: number;
    medium: number;
    high: number;
  };
  sexDistribution: {
    male: number;
    female: number;
  };
}

export interface ModelInfo {
  path: string;
  isLoaded: boolean;
  modelType?: string;
  version?: string;
  featureCount?: number;
  loadedAt?: Date;
  error?: string;
}

// Database row types
export interface EvaluationRow {
  id: number;
  age: number;
  sex: string;
  responses: string; // JSON array of booleans
  consent: number;
  probability: number;
  created_at: string;
}

export interface StatisticsRow {
  total: number;
  low: number | null;
  medium: number | null;
  high: number | null;
  male: number | null;
  female: number | null;
}
