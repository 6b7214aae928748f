import { describe, it, expect } from '@jest/globals';
import {
  type EnquirySubmission,
  normalizePlan,
  readEnquirySubmission,
  validateEnquiry,
} from '../../../src/enquiry/EnquiryForm.js';

function submission(overrides: Partial<EnquirySubmission> = {}): EnquirySubmission {
  return {
    name: 'Ada Byron',
    email: 'ada@example.org',
    company: 'Analytical Engines Ltd',
    phone: '',
    plan: 'Premium',
    message: 'We would like a quote for 40 servers.',
    website: '',
    renderedAt: 0,
    ...overrides,
  };
}

describe('EnquiryForm', () => {
  describe('readEnquirySubmission', () => {
    it('should trim strings and default missing fields to empty', () => {
      expect(readEnquirySubmission({ name: '  Ada  ', email: 'ada@example.org\n', renderedAt: '1700000000' })).toEqual({
        name: 'Ada',
        email: 'ada@example.org',
        company: '',
        phone: '',
        plan: '',
        message: '',
        website: '',
        renderedAt: 1700000000,
      });
    });

    it('should drop non-string values', () => {
      const read = readEnquirySubmission({ name: ['Ada'], company: 42, message: { text: 'hi' } });
      expect(read.name).toBe('');
      expect(read.company).toBe('');
      expect(read.message).toBe('');
    });

    it('should accept _ts as the render timestamp', () => {
      expect(readEnquirySubmission({ _ts: 1700000123 }).renderedAt).toBe(1700000123);
    });

    it('should turn an unusable timestamp into 0', () => {
      expect(readEnquirySubmission({ renderedAt: 'yesterday' }).renderedAt).toBe(0);
    });

    it('should treat a non-object body as empty', () => {
      expect(readEnquirySubmission('name=Ada').name).toBe('');
      expect(readEnquirySubmission(null).email).toBe('');
    });

    it('should treat an array body as empty', () => {
      expect(readEnquirySubmission([{ name: 'Ada' }])).toEqual({
        name: '',
        email: '',
        company: '',
        phone: '',
        plan: '',
        message: '',
        website: '',
        renderedAt: 0,
      });
    });
  });

  describe('normalizePlan', () => {
    it('should keep known plans and drop the rest', () => {
      expect(normalizePlan('Standard')).toBe('Standard');
      expect(normalizePlan('Not Sure')).toBe('Not Sure');
      expect(normalizePlan('premium')).toBe('');
      expect(normalizePlan('Gold')).toBe('');
    });
  });

  describe('validateEnquiry', () => {
    it('should accept a complete submission', () => {
      const { enquiry, errors } = validateEnquiry(submission());
      expect(errors).toEqual([]);
      expect(enquiry).toEqual({
        name: 'Ada Byron',
        email: 'ada@example.org',
        company: 'Analytical Engines Ltd',
        phone: '',
        plan: 'Premium',
        message: 'We would like a quote for 40 servers.',
      });
    });

    it('should list missing fields in form order', () => {
      const { errors } = validateEnquiry(submission({ name: '', email: '', company: '', message: '' }));
      expect(errors).toEqual([
        'Name is required.',
        'Email is required.',
        'Company name is required.',
        'Message is required.',
      ]);
    });

    it('should reject a malformed email', () => {
      expect(validateEnquiry(submission({ email: 'ada@' })).errors).toEqual(['Please enter a valid email address.']);
    });

    it('should enforce the message length in characters', () => {
      expect(validateEnquiry(submission({ message: 'Too short' })).errors).toEqual([
        'Message must be at least 10 characters.',
      ]);
      expect(validateEnquiry(submission({ message: 'x'.repeat(5001) })).errors).toEqual([
        'Message must be under 5000 characters.',
      ]);
      expect(validateEnquiry(submission({ message: 'x'.repeat(5000) })).errors).toEqual([]);
    });

    it('should count emoji as single characters', () => {
      expect(validateEnquiry(submission({ message: '🚀'.repeat(10) })).errors).toEqual([]);
      expect(validateEnquiry(submission({ message: '🚀'.repeat(9) })).errors).toEqual([
        'Message must be at least 10 characters.',
      ]);
    });
  });
});
