import dotenv from 'dotenv';
import { createApp } from './app';
import { getSettings } from './config/settings';
import { closeDatabase, initializeDatabase } from './config/database';
import { EvaluationRepository } from './repositories/EvaluationRepository';
import { FileArtifactSource, RiskScorer } from './services/ml/RiskScorer';
import { EvaluationPipeline } from './services/evaluation/EvaluationPipeline';

// Load environment variables
dotenv.config();

async function startServer(): Promise<void> {
  try {
    console.log('🔧 Initializing services...');
    const settings = getSettings();

    console.log('📊 Setting up database...');
    const db = await initializeDatabase();

    const scorer = new RiskScorer(new FileArtifactSource(settings.modelPath));
    const pipeline = new EvaluationPipeline(scorer, new EvaluationRepository(db), {
      featureLayout: settings.featureLayout
    });

    // Warm the model; a failure leaves the service up and reporting degraded scoring
    const loaded = await scorer.load();
    if (!loaded.ok) {
      console.warn(`⚠️ Model not loaded at startup: ${loaded.error.message}`);
    }

    const app = createApp({ pipeline, settings, corsOrigin: settings.frontendUrl });

    const server = app.listen(settings.port, () => {
      console.log(`🚀 Server running on port ${settings.port}`);
      console.log(`🧠 NDD Risk Screening API`);
      console.log(`🏥 Health check: http://localhost:${settings.port}/health`);
      console.log(`📚 API endpoints: http://localhost:${settings.port}/api/v1`);
    });

    const shutdown = (signal: string) => {
      console.log(`🛑 ${signal} received, shutting down`);
      server.close(() => {
        closeDatabase()
          .then(() => process.exit(0))
          .catch(error => {
            console.error('❌ Failed to close database:', error);
            process.exit(1);
          });
      });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
  }
}

// Start the server
void startServer();
