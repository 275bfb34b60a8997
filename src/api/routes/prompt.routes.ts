import { Router } from 'express';
import { logger } from '../../config/logger';
import { buildCriterionTemplates, NoCriteriaError } from '../../services/rubric';
import { resolveMessage } from '../requestHelpers';

const router = Router();

/**
 * POST /api/prompt
 * Body field `message` (form, multipart or JSON) or the raw body holds a full
 * combined template. Returns one template per criterion.
 */
router.post('/', (req, res) => {
  const raw = resolveMessage(req);
  if (!raw) {
    return res.status(400).json({ error: 'missing raw template content' });
  }
  try {
    const data = buildCriterionTemplates(raw);
    logger.debug('Built criterion templates', { count: data.length });
    return res.json({ data, count: data.length });
  } catch (error) {
    if (error instanceof NoCriteriaError) {
      return res.status(400).json({ error: error.message });
    }
    logger.error('Template build failed', { error: (error as Error).message });
    return res.status(500).json({ error: 'Failed to build templates' });
  }
});

export const promptRoutes = router;
