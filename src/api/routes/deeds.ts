import { Router, type Request, type Response } from 'express';
import { processDocumentInput, validateDeedInput, formatIssues } from '../../domain/schemas.js';
import { errorResponse, sendOutcome } from '../middleware/error-handler.js';
import { processDocument, validateDeed, type PipelineDeps } from '../../services/pipeline/index.js';

export function createDeedRouter(deps: PipelineDeps): Router {
  const router = Router();

  router.post('/deeds/validate', (req: Request, res: Response) => {
    const parsed = validateDeedInput.safeParse(req.body);
    if (!parsed.success) {
      res.status(422).json(errorResponse('VALIDATION_ERROR', 'Invalid request body', formatIssues(parsed.error)));
      return;
    }

    sendOutcome(res, validateDeed(parsed.data.record, deps.catalog));
  });

  router.post('/deeds/process', async (req: Request, res: Response) => {
    const parsed = processDocumentInput.safeParse(req.body);
    if (!parsed.success) {
      res.status(422).json(errorResponse('VALIDATION_ERROR', 'Invalid request body', formatIssues(parsed.error)));
      return;
    }

    sendOutcome(res, await processDocument(deps, parsed.data.text));
  });

  return router;
}
