import {
  EvaluationRecord,
  EvaluationRow,
  EvaluationStatistics,
  EvaluationSummary,
  Sex,
  StatisticsRow
} from '../types/models';

/**
 * Transformation functions between database rows and model objects
 */

function parseResponses(text: string): boolean[] {
  const decoded: unknown = JSON.parse(text);
  if (!Array.isArray(decoded) || !decoded.every((item): item is boolean => typeof item === 'boolean')) {
    throw new Error('Stored responses are not a boolean array');
  }
  return decoded;
}

function parseSex(value: string): Sex {
  if (value === 'M' || value === 'F') {
    return value;
  }
  throw new Error(`Stored sex "${value}" is not M or F`);
}

export function evaluationRowToModel(row: EvaluationRow): EvaluationRecord {
  return {
    id: row.id,
    age: row.age,
    sex: parseSex(row.sex),
    responses: parseResponses(row.responses),
    consent: Boolean(row.consent),
    probability: row.probability,
    createdAt: new Date(row.created_at)
  };
}

export function evaluationRowToSummary(row: Omit<EvaluationRow, 'responses'>): EvaluationSummary {
  return {
    id: row.id,
    age: row.age,
    sex: parseSex(row.sex),
    consent: Boolean(row.consent),
    probability: row.probability,
    createdAt: new Date(row.created_at)
  };
}

export function statisticsRowToModel(row: StatisticsRow | undefined): EvaluationStatistics {
  return {
    totalEvaluations: row?.total ?? 0,
    riskDistribution: {
      low: row?.low ?? 0,
      medium: row?.medium ?? 0,
      high: row?.high ?? 0
    },
    sexDistribution: {
      male: row?.male ?? 0,
      female: row?.female ?? 0
    }
  };
}

// API response transformations
export function evaluationToApiResponse(record: EvaluationRecord | EvaluationSummary) {
  return {
    ...record,
    createdAt: record.createdAt.toISOString()
  };
}
