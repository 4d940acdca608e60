import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import { config } from './config.js';
import { errorHandler } from './middleware/error-handler.js';
import { createApiRouter } from './routes/index.js';
import type { FileInfoProvider } from './services/file-info-provider.js';
import { TeraboxClient } from './services/terabox.js';
import { ENDPOINTS, MESSAGES } from './utils/constants.js';
import { getRequestOrigin } from './utils/url.js';

export interface AppOptions {
  provider?: FileInfoProvider;
}

export function createApp({ provider = new TeraboxClient() }: AppOptions = {}) {
  const app = express();

  app.set('trust proxy', config.trustProxy);

  const origins = config.corsOrigin.split(',').map((origin) => origin.trim());

  app.use(helmet());
  app.use(cors({ origin: config.corsOrigin === '*' ? true : origins }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.get('/', (req, res) => {
    res.json({
      name: 'Terabox Downloader API',
      version: '1.0',
      endpoints: {
        download: ENDPOINTS.DOWNLOAD,
        info: ENDPOINTS.INFO,
        health: ENDPOINTS.HEALTH
      },
      usage: {
        method: 'POST',
        url: `${getRequestOrigin(req)}${ENDPOINTS.DOWNLOAD}`,
        body: { url: 'https://terabox.com/s/xxxxx' }
      }
    });
  });

  app.get(ENDPOINTS.HEALTH, (_req, res) => {
    res.json({ status: 'healthy', message: 'API is running' });
  });

  app.use('/api', createApiRouter(provider));

  app.use((_req, res) => {
    res.status(404).json({ success: false, message: MESSAGES.NOT_FOUND });
  });

  app.use(errorHandler);

  return app;
}
