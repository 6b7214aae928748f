/**
 * Enquiry Servlet
 *
 * Accepts contact-sales submissions (JSON or urlencoded form bodies).
 *
 * Endpoints:
 *   POST /  - Validate and mail an enquiry
 *
 * Responses:
 *   200 { success: true }                   sent, or silently discarded (honeypot)
 *   400 { success: false, errors: [...] }   validation / timing errors
 *   429 { success: false, errors: [...] }   too many successful submissions from this client
 *   502 { success: false, errors: [...] }   the relay refused or could not be reached
 */

import { Router, Request, Response, NextFunction } from 'express';
import rateLimit from 'express-rate-limit';
import type { EnquirySettings } from '../../config/MailerConfig.js';
import type { EnquiryService } from '../../enquiry/EnquiryService.js';

export const RATE_LIMIT_ERROR = 'Too many submissions. Please try again in a few minutes.';

/** res.locals key holding the outcome, read by the rate limiter */
const OUTCOME_LOCAL = 'enquiryOutcome';

export function createEnquiryRouter(
  service: EnquiryService,
  settings: Pick<EnquirySettings, 'rateLimit' | 'rateWindowMinutes'>
): Router {
  const router = Router();

  // Only delivered enquiries count towards the limit
  const limiter = rateLimit({
    windowMs: settings.rateWindowMinutes * 60 * 1000,
    limit: settings.rateLimit,
    skipFailedRequests: true,
    requestWasSuccessful: (_req: Request, res: Response) =>
      res.statusCode < 400 && res.locals[OUTCOME_LOCAL] === 'sent',
    standardHeaders: true,
    legacyHeaders: false,
    message: { success: false, errors: [RATE_LIMIT_ERROR] },
  });

  /**
   * POST / - Submit an enquiry
   */
  router.post('/', limiter, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome = await service.submit(req.body);
      res.locals[OUTCOME_LOCAL] = outcome.status;

      switch (outcome.status) {
        case 'sent':
        case 'discarded':
          res.json({ success: true });
          return;
        case 'rejected':
          res.status(400).json({ success: false, errors: outcome.errors });
          return;
        case 'failed':
          res.status(502).json({ success: false, errors: outcome.errors });
          return;
      }
    } catch (error) {
      next(error);
    }
  });

  return router;
}
