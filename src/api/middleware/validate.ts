import { Request, Response, NextFunction } from 'express';
import { validationResult, ValidationChain } from 'express-validator';
import { logger } from '../../config/logger';

/** Runs the chains and answers 400 with the first error per field when any fails. */
export function validate(validations: ValidationChain[]) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await Promise.all(validations.map((v) => v.run(req)));
    const errors = validationResult(req);
    if (errors.isEmpty()) {
      next();
      return;
    }
    const details = errors.array({ onlyFirstError: true });
    logger.debug('Request validation failed', { path: req.originalUrl, details });
    res.status(400).json({ error: 'Validation failed', details });
  };
}
