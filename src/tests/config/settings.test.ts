import path from 'path';
import { getSettings } from '../../config/settings';

describe('getSettings', () => {
  it('should fall back to development defaults', () => {
    const settings = getSettings({});

    expect(settings).toEqual({
      port: 8000,
      nodeEnv: 'development',
      modelPath: path.join(process.cwd(), 'data', 'model.json'),
      featureLayout: undefined,
      apiKey: 'dev-api-key',
      jwtSecret: 'dev-jwt-secret',
      jwtExpiresInSeconds: 3600,
      frontendUrl: ['http://localhost:3000']
    });
  });

  it('should read values from the environment', () => {
    const settings = getSettings({
      PORT: '9100',
      MODEL_PATH: '/models/ndd.json',
      FEATURE_LAYOUT: 'extended',
      API_KEY: 'test-api-key',
      JWT_SECRET: 'test-secret',
      JWT_EXPIRES_IN_SECONDS: '60',
      FRONTEND_URL: 'http://a.test, http://b.test'
    });

    expect(settings).toMatchObject({
      port: 9100,
      modelPath: '/models/ndd.json',
      featureLayout: 'extended',
      apiKey: 'test-api-key',
      jwtSecret: 'test-secret',
      jwtExpiresInSeconds: 60,
      frontendUrl: ['http://a.test', 'http://b.test']
    });
  });

  it('should reject an unknown feature layout', () => {
    expect(() => getSettings({ FEATURE_LAYOUT: 'wide' })).toThrow('FEATURE_LAYOUT must be "compact" or "extended", got "wide"');
  });

  it('should require secrets in production', () => {
    expect(() => getSettings({ NODE_ENV: 'production', API_KEY: 'test-api-key' })).toThrow(
      'API_KEY and JWT_SECRET environment variables are required in production'
    );
  });
});
