import { Router } from 'express';
import { defaultB1Criteria, totalMaxScore } from '../../services/rubric';

const router = Router();

/** GET /api/criteria/default - reference B1 rubric */
router.get('/default', (_req, res) => {
  const data = defaultB1Criteria();
  res.json({ data, totalMaxScore: totalMaxScore(data) });
});

export const criteriaRoutes = router;
