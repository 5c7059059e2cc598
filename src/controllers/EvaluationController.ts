import { Request, Response } from 'express';
import { EvaluationPipeline } from '../services/evaluation/EvaluationPipeline';
import { validatePagination } from '../models/validation';
import { evaluationToApiResponse } from '../models/transformers';
import { PipelineFailure } from '../types/errors';
import { RiskPrediction } from '../types/models';

function predictionToApiResponse(prediction: RiskPrediction) {
  return {
    probability: prediction.probability,
    riskLevel: prediction.riskLevel,
    confidence: prediction.confidence,
    interpretation: prediction.interpretation
  };
}

/**
 * Translate a pipeline failure into an HTTP response
 */
export function sendPipelineError(res: Response, error: PipelineFailure): void {
  switch (error.kind) {
    case 'ValidationError':
      res.status(400).json({
        error: 'Validation error',
        field: error.field,
        message: error.message
      });
      return;
    case 'NotFound':
      res.status(404).json({
        error: 'Evaluation not found',
        message: error.message
      });
      return;
    case 'ModelUnavailable':
      res.status(503).json({
        error: 'Model unavailable',
        message: 'The risk model is not available right now'
      });
      return;
    case 'ModelIncompatible':
      res.status(500).json({
        error: 'Model incompatible',
        message: 'The risk model does not accept the submitted features'
      });
      return;
    case 'PersistenceError':
      res.status(500).json({
        error: 'Persistence error',
        message: 'Failed to store evaluation'
      });
      return;
  }
}

/**
 * EvaluationController handles HTTP requests for scoring and stored evaluations
 */
export class EvaluationController {
  constructor(private pipeline: EvaluationPipeline) {}

  /**
   * POST /api/v1/predict - Score a submission without storing it
   */
  async predict(req: Request, res: Response): Promise<void> {
    try {
      const result = await this.pipeline.evaluateOnly(req.body);

      if (!result.ok) {
        sendPipelineError(res, result.error);
        return;
      }

      res.json({
        success: true,
        prediction: predictionToApiResponse(result.value),
        estimatedRisk: `${(result.value.probability * 100).toFixed(2)}%`
      });
    } catch (error) {
      console.error('❌ Failed to score submission:', error);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to score submission'
      });
    }
  }

  /**
   * POST /api/v1/submit - Score a consenting submission and store it
   */
  async submit(req: Request, res: Response): Promise<void> {
    try {
      const result = await this.pipeline.evaluateAndStore(req.body);

      if (!result.ok) {
        sendPipelineError(res, result.error);
        return;
      }

      const { record, prediction } = result.value;
      res.status(201).json({
        success: true,
        message: 'Evaluation saved successfully',
        evaluationId: record.id,
        prediction: predictionToApiResponse(prediction),
        timestamp: record.createdAt.toISOString()
      });
    } catch (error) {
      console.error('❌ Failed to submit evaluation:', error);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to submit evaluation'
      });
    }
  }

  /**
   * GET /api/v1/evaluations - Newest evaluations first
   */
  async getEvaluations(req: Request, res: Response): Promise<void> {
    try {
      const params = validatePagination(req.query);

      if (!params.ok) {
        sendPipelineError(res, params.error);
        return;
      }

      const { limit, offset } = params.value;
      const evaluations = await this.pipeline.listEvaluations(limit, offset);

      res.json({
        evaluations: evaluations.map(evaluationToApiResponse),
        pagination: {
          limit,
          offset,
          total: evaluations.length
        }
      });
    } catch (error) {
      console.error('❌ Failed to get evaluations:', error);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to retrieve evaluations'
      });
    }
  }

  /**
   * GET /api/v1/evaluations/:id - A single evaluation including its responses
   */
  async getEvaluationById(req: Request, res: Response): Promise<void> {
    try {
      const rawId = req.params.id;

      if (!rawId || !/^\d+$/.test(rawId)) {
        res.status(400).json({
          error: 'Invalid evaluation ID',
          message: 'Evaluation ID must be a positive integer'
        });
        return;
      }

      const result = await this.pipeline.getEvaluation(parseInt(rawId, 10));

      if (!result.ok) {
        sendPipelineError(res, result.error);
        return;
      }

      res.json({ evaluation: evaluationToApiResponse(result.value) });
    } catch (error) {
      console.error('❌ Failed to get evaluation by ID:', error);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to retrieve evaluation'
      });
    }
  }

  /**
   * GET /api/v1/stats - Counts by risk level and sex
   */
  async getStatistics(req: Request, res: Response): Promise<void> {
    try {
      const statistics = await this.pipeline.getStatistics();
      res.json(statistics);
    } catch (error) {
      console.error('❌ Failed to get statistics:', error);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to get statistics'
      });
    }
  }

  /**
   * GET /api/v1/stats/public - Totals and risk distribution only
   */
  async getPublicStatistics(req: Request, res: Response): Promise<void> {
    try {
      const { totalEvaluations, riskDistribution } = await this.pipeline.getStatistics();
      res.json({ totalEvaluations, riskDistribution });
    } catch (error) {
      console.error('❌ Failed to get public statistics:', error);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to get statistics'
      });
    }
  }

  /**
   * GET /api/v1/model/info - Loaded model details
   */
  async getModelInfo(req: Request, res: Response): Promise<void> {
    try {
      const info = await this.pipeline.getModelInfo();
      res.status(info.isLoaded ? 200 : 503).json({
        model: {
          ...info,
          loadedAt: info.loadedAt?.toISOString()
        }
      });
    } catch (error) {
      console.error('❌ Failed to get model info:', error);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to get model info'
      });
    }
  }
}
