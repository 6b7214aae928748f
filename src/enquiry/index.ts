/**
 * Enquiry Module
 */

export { EnquiryService, composeEnquiryBody } from './EnquiryService.js';
export type { EnquiryOutcome, EnquiryServiceConfig, RecipientFailure } from './EnquiryService.js';
export {
  ENQUIRY_PLANS,
  MESSAGE_MIN_LENGTH,
  MESSAGE_MAX_LENGTH,
  readEnquirySubmission,
  normalizePlan,
  validateEnquiry,
} from './EnquiryForm.js';
export type { Enquiry, EnquiryPlan, EnquirySubmission } from './EnquiryForm.js';
export { checkSubmission, TOO_QUICK_ERROR } from './EnquiryGuard.js';
export type { GuardVerdict, GuardOptions } from './EnquiryGuard.js';
