import { Database, open } from 'sqlite';
import sqlite3 from 'sqlite3';
import { ArtifactSource } from '../services/ml/RiskScorer';
import { runMigrations } from '../database/migrations';

/**
 * Artifact source backed by a value in memory; counts reads
 */
export class StaticArtifactSource implements ArtifactSource {
  readonly location = 'memory://test-model';
  reads = 0;

  constructor(private readonly produce: () => Promise<unknown>) {}

  static of(document: unknown): StaticArtifactSource {
    return new StaticArtifactSource(async () => document);
  }

  async read(): Promise<unknown> {
    this.reads++;
    return this.produce();
  }
}

/**
 * Logistic artifact where every feature shares one weight
 */
export function logisticArtifact(featureCount: number, weight: number, intercept: number) {
  return {
    format: 'ndd-risk-classifier',
    version: 'test',
    modelType: 'logistic_regression',
    featureCount,
    coefficients: new Array<number>(featureCount).fill(weight),
    intercept
  };
}

// true at even positions: 20 of 40 answers are yes
export function alternatingResponses(): boolean[] {
  return Array.from({ length: 40 }, (_, i) => i % 2 === 0);
}

export function validSubmission(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    age: 8,
    sex: 'M',
    responses: alternatingResponses(),
    consent: true,
    ...overrides
  };
}

export async function openMigratedDatabase(): Promise<Database> {
  const db = await open({
    filename: ':memory:',
    driver: sqlite3.Database
  });
  await runMigrations(db);
  return db;
}
