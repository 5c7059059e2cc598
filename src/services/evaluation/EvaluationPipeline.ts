import { FeatureVectorizer } from '../ml/FeatureVectorizer';
import { RiskScorer } from '../ml/RiskScorer';
import { stratify } from '../ml/RiskStratifier';
import { EvaluationRepository } from '../../repositories/EvaluationRepository';
import { validateSubmission } from '../../models/validation';
import {
  EvaluationRecord,
  EvaluationStatistics,
  EvaluationSummary,
  FeatureLayout,
  ModelInfo,
  RiskPrediction,
  Submission
} from '../../types/models';
import {
  ModelIncompatibleError,
  ModelUnavailableError,
  NotFoundError,
  PersistenceError,
  Result,
  ValidationError,
  err,
  ok
} from '../../types/errors';

export type ScoringError = ValidationError | ModelUnavailableError | ModelIncompatibleError;

export interface StoredEvaluation {
  record: EvaluationRecord;
  prediction: RiskPrediction;
}

export interface EvaluationPipelineOptions {
  // Skip the compact-then-extended fallback and always use this layout
  featureLayout?: FeatureLayout;
}

/**
 * Runs a submission through validation, vectorization, scoring and
 * stratification, and optionally stores the outcome.
 */
export class EvaluationPipeline {
  private readonly vectorizer = new FeatureVectorizer();

  constructor(
    private readonly scorer: RiskScorer,
    private readonly repository: EvaluationRepository,
    private readonly options: EvaluationPipelineOptions = {}
  ) {}

  /**
   * Score a submission without storing it. Consent is not required.
   */
  async evaluateOnly(raw: unknown): Promise<Result<RiskPrediction, ScoringError>> {
    const validated = validateSubmission(raw);
    if (!validated.ok) {
      return validated;
    }

    return this.predict(validated.value);
  }

  /**
   * Score a consenting submission and persist it. Nothing is returned as
   * stored unless the record was written.
   */
  async evaluateAndStore(raw: unknown): Promise<Result<StoredEvaluation, ScoringError | PersistenceError>> {
    const validated = validateSubmission(raw);
    if (!validated.ok) {
      return validated;
    }

    const submission = validated.value;
    if (submission.consent !== true) {
      return err(new ValidationError('consent.required', 'Consent must be accepted before an evaluation can be stored'));
    }

    const predicted = await this.predict(submission);
    if (!predicted.ok) {
      return predicted;
    }

    const prediction = predicted.value;
    try {
      const record = await this.repository.append({
        age: submission.age,
        sex: submission.sex,
        responses: submission.responses,
        consent: true,
        probability: prediction.probability
      });
      console.log(`💾 Stored evaluation ${record.id} (${prediction.riskLevel}, p=${prediction.probability.toFixed(3)})`);
      return ok({ record, prediction });
    } catch (error) {
      if (error instanceof PersistenceError) {
        return err(error);
      }
      console.error('❌ Unexpected failure while storing evaluation:', error);
      return err(new PersistenceError('Failed to store evaluation', error));
    }
  }

  async listEvaluations(limit: number, offset: number): Promise<EvaluationSummary[]> {
    return this.repository.list(limit, offset);
  }

  async getEvaluation(id: number): Promise<Result<EvaluationRecord, NotFoundError>> {
    const record = await this.repository.getById(id);
    return record ? ok(record) : err(new NotFoundError(id));
  }

  async getStatistics(): Promise<EvaluationStatistics> {
    return this.repository.aggregate();
  }

  /**
   * Model details, loading the artifact first if nothing has loaded it yet
   */
  async getModelInfo(): Promise<ModelInfo> {
    await this.scorer.load();
    return this.scorer.getModelInfo();
  }

  private async predict(submission: Submission): Promise<Result<RiskPrediction, ModelUnavailableError | ModelIncompatibleError>> {
    const pinned = this.options.featureLayout;
    let scored = await this.scorer.score(this.vectorizer.vectorize(submission, pinned ?? 'compact'));

    // One extended retry, only for a shape mismatch on the unpinned compact attempt
    if (!scored.ok && scored.error instanceof ModelIncompatibleError && !pinned) {
      console.warn(`⚠️ Compact features rejected (${scored.error.message}); retrying with extended features`);
      scored = await this.scorer.score(this.vectorizer.vectorize(submission, 'extended'));
    }

    if (!scored.ok) {
      if (scored.error instanceof ModelIncompatibleError) {
        console.error(`❌ Feature vector does not fit the model: ${scored.error.message}`);
      }
      return scored;
    }

    const { probability, confidence } = scored.value;
    return ok({ probability, confidence, ...stratify(probability) });
  }
}
