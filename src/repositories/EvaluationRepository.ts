import { Database } from 'sqlite';
import {
  EvaluationDraft,
  EvaluationRecord,
  EvaluationRow,
  EvaluationStatistics,
  EvaluationSummary,
  StatisticsRow
} from '../types/models';
import { PersistenceError } from '../types/errors';
import { getDatabase } from '../config/database';
import {
  evaluationRowToModel,
  evaluationRowToSummary,
  statisticsRowToModel
} from '../models/transformers';
import { RISK_LEVEL_THRESHOLDS } from '../services/ml/RiskStratifier';

/**
 * EvaluationRepository stores screening evaluations in SQLite.
 *
 * Records are append-only. Each append is a single INSERT, which SQLite
 * commits atomically together with the id it assigns.
 */
export class EvaluationRepository {
  constructor(private db: Database | null = null) {}

  private async getDb(): Promise<Database> {
    if (!this.db) {
      this.db = await getDatabase();
    }
    return this.db;
  }

  /**
   * Persist a new evaluation and return it with its assigned id and timestamp
   */
  async append(draft: EvaluationDraft): Promise<EvaluationRecord> {
    const createdAt = new Date();

    try {
      const db = await this.getDb();
      const result = await db.run(
        `INSERT INTO evaluations (age, sex, responses, consent, probability, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
        [
          draft.age,
          draft.sex,
          JSON.stringify(draft.responses),
          draft.consent ? 1 : 0,
          draft.probability,
          createdAt.toISOString()
        ]
      );

      if (result.lastID === undefined) {
        throw new Error('Insert did not report a row id');
      }

      return {
        id: result.lastID,
        age: draft.age,
        sex: draft.sex,
        responses: [...draft.responses],
        consent: draft.consent,
        probability: draft.probability,
        createdAt
      };
    } catch (error) {
      console.error('❌ Failed to store evaluation:', error);
      throw new PersistenceError('Failed to store evaluation', error);
    }
  }

  /**
   * Get evaluation by ID
   */
  async getById(id: number): Promise<EvaluationRecord | null> {
    const db = await this.getDb();

    try {
      const row = await db.get<EvaluationRow>('SELECT * FROM evaluations WHERE id = ?', [id]);
      return row ? evaluationRowToModel(row) : null;
    } catch (error) {
      console.error('❌ Failed to get evaluation by ID:', error);
      throw error;
    }
  }

  /**
   * Newest evaluations first; an offset past the end yields an empty page
   */
  async list(limit: number, offset: number): Promise<EvaluationSummary[]> {
    if (!Number.isInteger(limit) || limit < 0 || !Number.isInteger(offset) || offset < 0) {
      throw new RangeError('limit and offset must be non-negative integers');
    }
    if (limit === 0) {
      return [];
    }

    const db = await this.getDb();

    try {
      const rows = await db.all<Omit<EvaluationRow, 'responses'>[]>(
        `SELECT id, age, sex, consent, probability, created_at
         FROM evaluations
         ORDER BY created_at DESC, id DESC
         LIMIT ? OFFSET ?`,
        [limit, offset]
      );
      return rows.map(evaluationRowToSummary);
    } catch (error) {
      console.error('❌ Failed to list evaluations:', error);
      throw error;
    }
  }

  async count(): Promise<number> {
    const db = await this.getDb();
    const row = await db.get<{ count: number }>('SELECT COUNT(*) as count FROM evaluations');
    return row?.count ?? 0;
  }

  /**
   * Counts by risk level and by sex over everything stored right now
   */
  async aggregate(): Promise<EvaluationStatistics> {
    const db = await this.getDb();

    try {
      const row = await db.get<StatisticsRow>(
        `SELECT
           COUNT(*) AS total,
           SUM(CASE WHEN probability < ? THEN 1 ELSE 0 END) AS low,
           SUM(CASE WHEN probability >= ? AND probability < ? THEN 1 ELSE 0 END) AS medium,
           SUM(CASE WHEN probability >= ? THEN 1 ELSE 0 END) AS high,
           SUM(CASE WHEN sex = 'M' THEN 1 ELSE 0 END) AS male,
           SUM(CASE WHEN sex = 'F' THEN 1 ELSE 0 END) AS female
         FROM evaluations`,
        [
          RISK_LEVEL_THRESHOLDS.medium,
          RISK_LEVEL_THRESHOLDS.medium,
          RISK_LEVEL_THRESHOLDS.high,
          RISK_LEVEL_THRESHOLDS.high
        ]
      );
      return statisticsRowToModel(row);
    } catch (error) {
      console.error('❌ Failed to aggregate evaluations:', error);
      throw error;
    }
  }
}
