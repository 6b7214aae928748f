import { describe, it, expect, jest } from '@jest/globals';
import request from 'supertest';
import { createApp } from '../../../src/api/server.js';
import { EnquiryService } from '../../../src/enquiry/EnquiryService.js';
import type { MailSendFunction } from '../../../src/connectors/smtp/SmtpSender.js';
import { createSmtpClientProperties } from '../../../src/connectors/smtp/SmtpClientProperties.js';

function buildApp() {
  const settings = {
    recipients: ['sales@example.com'],
    subject: 'Enterprise Enquiry',
    siteName: 'example.com',
    fallbackAddress: 'hello@example.com',
    minFillSeconds: 0,
    rateLimit: 3,
    rateWindowMinutes: 10,
  };
  const enquiryService = new EnquiryService({
    settings,
    smtp: createSmtpClientProperties({ host: 'relay.test', from: 'mailer@example.com' }),
    send: jest.fn<MailSendFunction>(),
  });
  return createApp({ enquiryService, enquirySettings: settings });
}

describe('createApp', () => {
  it('should answer the health check', async () => {
    const res = await request(buildApp()).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
    expect(typeof res.body.timestamp).toBe('string');
  });

  it('should set security headers', async () => {
    const res = await request(buildApp()).get('/health');

    expect(res.headers['x-content-type-options']).toBe('nosniff');
    expect(res.headers['x-powered-by']).toBeUndefined();
  });

  it('should return JSON for unknown routes', async () => {
    const res = await request(buildApp()).get('/api/unknown');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Not Found', message: 'The requested resource was not found' });
  });

  it('should answer malformed JSON with 400', async () => {
    const res = await request(buildApp())
      .post('/api/enquiries')
      .set('Content-Type', 'application/json')
      .send('{"name": ');

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Bad Request');
  });

  describe('request IDs', () => {
    it('should echo a safe incoming ID', async () => {
      const res = await request(buildApp()).get('/health').set('X-Request-ID', 'form-7f3a');

      expect(res.headers['x-request-id']).toBe('form-7f3a');
    });

    it('should replace an unsafe ID with a UUID', async () => {
      const res = await request(buildApp()).get('/health').set('X-Request-ID', 'bad id\tvalue');

      expect(res.headers['x-request-id']).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    });
  });
});
