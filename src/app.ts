import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import { type AppConfig, isProduction, loadConfig, loadEnvFiles } from './config/environment';
import { createServices, type Services } from './services';
import { SessionStore } from './services/Query/SessionStore';
import { createIngestRoutes } from './api/routes/ingestRoutes';
import { createQueryRoutes } from './api/routes/queryRoutes';
import { errorHandler } from './api/middleware/error-handler';
import DebugLogger from './utils/DebugLogger';
import { createLogger } from './utils/logger';

const logger = createLogger('Server');

export function createApp(services: Services, sessions: SessionStore = new SessionStore()): Express {
  const app: Express = express();

  app.use(cors({
    origin: process.env.FRONTEND_URL || (isProduction ? false : true),
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With']
  }));
  app.use(express.json({ limit: '1mb' }));

  app.get('/', (req: Request, res: Response) => {
    res.send('Server is running!');
  });

  app.get('/health', (req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' });
  });

  app.get('/api/health', (req: Request, res: Response) => {
    res.status(200).json({ status: 'ok', provider: services.provider.name });
  });

  app.use('/api/ingest', createIngestRoutes(services));
  app.use('/api', createQueryRoutes(services, sessions));

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Page Not found', isSuccess: false });
  });

  app.use(errorHandler);

  return app;
}

function startServer(config: AppConfig) {
  DebugLogger.configure(config.debugLogFile);
  const app = createApp(createServices(config));

  app.listen(config.port, () => {
    logger.info(`🚀 Server is running on port ${config.port}`);
    logger.info(`🌍 Environment: ${config.nodeEnv}`);
    logger.info(`🤖 Provider: ${config.provider.type}`);
  });
}

if (require.main === module) {
  try {
    loadEnvFiles();
    startServer(loadConfig());
  } catch (error) {
    logger.error('❌ Failed to start server:', error);
    process.exit(1);
  }
}
