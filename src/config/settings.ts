import path from 'path';
import { FeatureLayout } from '../types/models';

export interface AppSettings {
  port: number;
  nodeEnv: string;
  modelPath: string;
  featureLayout?: FeatureLayout;
  apiKey: string;
  jwtSecret: string;
  jwtExpiresInSeconds: number;
  frontendUrl: string[];
}

function parseFeatureLayout(value: string | undefined): FeatureLayout | undefined {
  if (!value) {
    return undefined;
  }
  if (value === 'compact' || value === 'extended') {
    return value;
  }
  throw new Error(`FEATURE_LAYOUT must be "compact" or "extended", got "${value}"`);
}

/**
 * Read application settings from the environment
 */
export function getSettings(env: NodeJS.ProcessEnv = process.env): AppSettings {
  const nodeEnv = env.NODE_ENV || 'development';
  const apiKey = env.API_KEY || '';
  const jwtSecret = env.JWT_SECRET || '';

  if (nodeEnv === 'production' && (!apiKey || !jwtSecret)) {
    throw new Error('API_KEY and JWT_SECRET environment variables are required in production');
  }

  return {
    port: parseInt(env.PORT || '8000', 10),
    nodeEnv,
    modelPath: env.MODEL_PATH || path.join(process.cwd(), 'data', 'model.json'),
    featureLayout: parseFeatureLayout(env.FEATURE_LAYOUT),
    apiKey: apiKey || 'dev-api-key',
    jwtSecret: jwtSecret || 'dev-jwt-secret',
    jwtExpiresInSeconds: parseInt(env.JWT_EXPIRES_IN_SECONDS || '3600', 10),
    frontendUrl: (env.FRONTEND_URL || 'http://localhost:3000').split(',').map(origin => origin.trim())
  };
}
