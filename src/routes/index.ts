import { Router } from 'express';
import { EvaluationController } from '../controllers/EvaluationController';
import { AuthController } from '../controllers/AuthController';
import { EvaluationPipeline } from '../services/evaluation/EvaluationPipeline';
import { authenticateToken } from '../middleware/auth';
import { AppSettings } from '../config/settings';

export interface RouteDependencies {
  pipeline: EvaluationPipeline;
  settings: Pick<AppSettings, 'apiKey' | 'jwtSecret' | 'jwtExpiresInSeconds'>;
}

/**
 * Configure the versioned API routes. Mounted once by the caller under /api/v1.
 */
export function createRoutes({ pipeline, settings }: RouteDependencies): Router {
  const router = Router();

  const evaluationController = new EvaluationController(pipeline);
  const authController = new AuthController({
    apiKey: settings.apiKey,
    jwtSecret: settings.jwtSecret,
    expiresInSeconds: settings.jwtExpiresInSeconds
  });

  // Public routes
  router.post('/predict', evaluationController.predict.bind(evaluationController));
  router.post('/submit', evaluationController.submit.bind(evaluationController));
  router.get('/stats/public', evaluationController.getPublicStatistics.bind(evaluationController));
  router.post('/auth/login', authController.login);

  // Protected routes (authentication required)
  router.use(authenticateToken(settings.jwtSecret));

  router.get('/auth/verify', authController.verify);
  router.get('/evaluations', evaluationController.getEvaluations.bind(evaluationController));
  router.get('/evaluations/:id', evaluationController.getEvaluationById.bind(evaluationController));
  router.get('/stats', evaluationController.getStatistics.bind(evaluationController));
  router.get('/model/info', evaluationController.getModelInfo.bind(evaluationController));

  return router;
}
