import { Router, type Request, type RequestHandler } from 'express';
import { z } from 'zod';
import type { FileInfoProvider } from '../services/file-info-provider.js';
import { MESSAGES } from '../utils/constants.js';

const linkSchema = z.object({
  url: z.unknown()
});

type ShareLinkInput =
  | { kind: 'missing' }
  | { kind: 'not-a-string' }
  | { kind: 'link'; url: string };

function readShareLink(req: Request): ShareLinkInput {
  const source: unknown = req.method === 'POST' ? req.body : req.query;
  const parsed = linkSchema.safeParse(source);
  const url = parsed.success ? parsed.data.url : undefined;

  if (url === undefined || url === null || url === '') {
    return { kind: 'missing' };
  }
  return typeof url === 'string' ? { kind: 'link', url } : { kind: 'not-a-string' };
}

const methodNotAllowed: RequestHandler = (_req, res) => {
  res.status(405).json({ success: false, message: MESSAGES.METHOD_NOT_ALLOWED });
};

export function createFilesRouter(provider: FileInfoProvider) {
  const router = Router();

  const handle =
    (withDownloadUrl: boolean): RequestHandler =>
    async (req, res, next) => {
      try {
        const link = readShareLink(req);
        if (link.kind === 'missing') {
          return res.status(400).json({ success: false, message: MESSAGES.URL_REQUIRED });
        }
        // Present but unusable values are a soft failure, not a missing parameter.
        if (link.kind === 'not-a-string') {
          return res.json({ success: false, message: `Error: ${MESSAGES.URL_NOT_STRING}` });
        }

        const result = await provider.getFileInfo(link.url, { withDownloadUrl });
        return res.json(result);
      } catch (error) {
        next(error);
      }
    };

  router.route('/download').get(handle(true)).post(handle(true)).all(methodNotAllowed);

  // Metadata only: the download link is never resolved for this route.
  router.route('/info').get(handle(false)).post(handle(false)).all(methodNotAllowed);

  return router;
}
