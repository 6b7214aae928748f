import { describe, it, expect, jest } from '@jest/globals';
import express from 'express';
import request from 'supertest';
import { createEnquiryRouter, RATE_LIMIT_ERROR } from '../../../../src/api/servlets/EnquiryServlet.js';
import { EnquiryService } from '../../../../src/enquiry/EnquiryService.js';
import type { EnquirySettings } from '../../../../src/config/MailerConfig.js';
import type { MailSendFunction, SmtpSendResult } from '../../../../src/connectors/smtp/SmtpSender.js';
import { createSmtpClientProperties } from '../../../../src/connectors/smtp/SmtpClientProperties.js';

const SENT: SmtpSendResult = { ok: true, messageId: '<m@example.com>', response: '250 2.0.0 Ok' };

const valid = {
  name: 'Ada Byron',
  email: 'ada@example.org',
  company: 'Analytical Engines Ltd',
  plan: 'Standard',
  message: 'Please send pricing for 12 nodes.',
};

function buildApp(send: MailSendFunction, overrides: Partial<EnquirySettings> = {}) {
  const settings: EnquirySettings = {
    recipients: ['sales@example.com'],
    subject: 'Enterprise Enquiry',
    siteName: 'example.com',
    fallbackAddress: 'hello@example.com',
    minFillSeconds: 0,
    rateLimit: 3,
    rateWindowMinutes: 10,
    ...overrides,
  };
  const service = new EnquiryService({
    settings,
    smtp: createSmtpClientProperties({ host: 'relay.test', from: 'mailer@example.com' }),
    send,
  });

  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.use('/api/enquiries', createEnquiryRouter(service, settings));
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    res.status(500).json({ error: err.message });
  });
  return app;
}

describe('EnquiryServlet', () => {
  describe('POST /api/enquiries', () => {
    it('should mail a valid JSON enquiry', async () => {
      const send = jest.fn<MailSendFunction>().mockResolvedValue(SENT);

      const res = await request(buildApp(send)).post('/api/enquiries').send(valid);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ success: true });
      expect(send).toHaveBeenCalledTimes(1);
    });

    it('should accept a urlencoded form post', async () => {
      const send = jest.fn<MailSendFunction>().mockResolvedValue(SENT);

      const res = await request(buildApp(send)).post('/api/enquiries').type('form').send(valid);

      expect(res.status).toBe(200);
      expect(send.mock.calls[0]?.[0].replyTo).toBe('ada@example.org');
    });

    it('should answer a honeypot hit like a success', async () => {
      const send = jest.fn<MailSendFunction>();

      const res = await request(buildApp(send))
        .post('/api/enquiries')
        .send({ ...valid, website: 'http://spam.test' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ success: true });
      expect(send).not.toHaveBeenCalled();
    });

    it('should return validation errors with 400', async () => {
      const send = jest.fn<MailSendFunction>();

      const res = await request(buildApp(send)).post('/api/enquiries').send({ ...valid, email: 'nope' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ success: false, errors: ['Please enter a valid email address.'] });
    });

    it('should answer a JSON array body with the usual validation errors', async () => {
      const send = jest.fn<MailSendFunction>();

      const res = await request(buildApp(send))
        .post('/api/enquiries')
        .set('Content-Type', 'application/json')
        .send('[{"name":"a"}]');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        success: false,
        errors: ['Name is required.', 'Email is required.', 'Company name is required.', 'Message is required.'],
      });
      expect(send).not.toHaveBeenCalled();
    });

    it('should return 502 when the relay fails', async () => {
      const send = jest.fn<MailSendFunction>().mockResolvedValue({
        ok: false,
        failure: { kind: 'connection-error', message: 'Connection failed: connect ECONNREFUSED' },
      });

      const res = await request(buildApp(send)).post('/api/enquiries').send(valid);

      expect(res.status).toBe(502);
      expect(res.body).toEqual({
        success: false,
        errors: ['Unable to send your message right now. Please email hello@example.com directly.'],
      });
    });

    it('should pass unexpected errors on', async () => {
      const send = jest.fn<MailSendFunction>().mockRejectedValue(new Error('boom'));

      const res = await request(buildApp(send)).post('/api/enquiries').send(valid);

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: 'boom' });
    });
  });

  describe('rate limiting', () => {
    it('should refuse submissions past the limit', async () => {
      const send = jest.fn<MailSendFunction>().mockResolvedValue(SENT);
      const agent = request(buildApp(send, { rateLimit: 2 }));

      expect((await agent.post('/api/enquiries').send(valid)).status).toBe(200);
      expect((await agent.post('/api/enquiries').send(valid)).status).toBe(200);
      const res = await agent.post('/api/enquiries').send(valid);

      expect(res.status).toBe(429);
      expect(res.body).toEqual({ success: false, errors: [RATE_LIMIT_ERROR] });
      expect(send).toHaveBeenCalledTimes(2);
    });

    it('should not count rejected or discarded submissions', async () => {
      const send = jest.fn<MailSendFunction>().mockResolvedValue(SENT);
      const agent = request(buildApp(send, { rateLimit: 1 }));

      expect((await agent.post('/api/enquiries').send({ ...valid, name: '' })).status).toBe(400);
      expect((await agent.post('/api/enquiries').send({ ...valid, website: 'x' })).status).toBe(200);
      expect((await agent.post('/api/enquiries').send({ ...valid, message: 'short' })).status).toBe(400);

      expect((await agent.post('/api/enquiries').send(valid)).status).toBe(200);
      expect((await agent.post('/api/enquiries').send(valid)).status).toBe(429);
    });

    it('should send the standard RateLimit headers', async () => {
      const send = jest.fn<MailSendFunction>().mockResolvedValue(SENT);

      const res = await request(buildApp(send)).post('/api/enquiries').send(valid);

      expect(res.headers['ratelimit-limit']).toBe('3');
    });
  });
});
