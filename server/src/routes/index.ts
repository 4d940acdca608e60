import { Router } from 'express';
import type { FileInfoProvider } from '../services/file-info-provider.js';
import { createFilesRouter } from './files.js';

export function createApiRouter(provider: FileInfoProvider) {
  const router = Router();

  router.use('/', createFilesRouter(provider));

  return router;
}
