import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createRoutes, RouteDependencies } from './routes';
import { pingDatabase } from './config/database';

export const API_PREFIX = '/api/v1';
export const SERVICE_VERSION = '1.0.0';

const ENDPOINTS = {
  health: 'GET /health',
  predict: `POST ${API_PREFIX}/predict`,
  submit: `POST ${API_PREFIX}/submit`,
  publicStats: `GET ${API_PREFIX}/stats/public`,
  login: `POST ${API_PREFIX}/auth/login`,
  evaluations: `GET ${API_PREFIX}/evaluations`,
  stats: `GET ${API_PREFIX}/stats`,
  modelInfo: `GET ${API_PREFIX}/model/info`
} as const;

export interface AppDependencies extends RouteDependencies {
  corsOrigin: string[];
  checkDatabase?: () => Promise<boolean>;
}

/**
 * Build the Express application without listening, so tests can drive it
 */
export function createApp(deps: AppDependencies): express.Application {
  const app = express();
  const checkDatabase = deps.checkDatabase ?? pingDatabase;

  app.use(helmet());
  app.use(cors({
    origin: deps.corsOrigin,
    credentials: true
  }));
  app.use(express.json({ limit: '1mb' }));

  const health = (apiVersion?: string) => async (req: express.Request, res: express.Response) => {
    const databaseUp = await checkDatabase().catch((error: unknown) => {
      console.error('❌ Health check failed:', error);
      return false;
    });
    res.status(databaseUp ? 200 : 503).json({
      status: databaseUp ? 'healthy' : 'degraded',
      ...(apiVersion ? { apiVersion } : {}),
      database: databaseUp ? 'connected' : 'unreachable',
      timestamp: new Date().toISOString(),
      service: 'ndd-risk-screening',
      version: SERVICE_VERSION
    });
  };

  app.get('/', (req, res) => {
    res.json({
      message: 'Neurodevelopmental Disorders Risk Screening API',
      version: SERVICE_VERSION,
      endpoints: ENDPOINTS,
      status: 'operational'
    });
  });

  app.get('/health', health());
  app.get(`${API_PREFIX}/health`, health('v1'));

  app.use(API_PREFIX, createRoutes(deps));

  // 404 handler
  app.use('*', (req, res) => {
    res.status(404).json({
      error: 'Not Found',
      message: `Route ${req.method} ${req.originalUrl} not found`,
      availableRoutes: ENDPOINTS
    });
  });

  // Error handler
  app.use((error: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({
        error: 'Invalid JSON',
        message: 'Request body could not be parsed'
      });
      return;
    }
    console.error('❌ Unhandled error:', error);
    res.status(500).json({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred'
    });
  });

  return app;
}
