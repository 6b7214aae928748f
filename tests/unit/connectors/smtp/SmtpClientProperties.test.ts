import { describe, it, expect } from '@jest/globals';
import {
  createSmtpClientProperties,
  getDefaultSmtpClientProperties,
  getMessageIdDomain,
  validateSmtpClientProperties,
} from '../../../../src/connectors/smtp/SmtpClientProperties.js';

describe('SmtpClientProperties', () => {
  it('should default to the submission port with verified TLS', () => {
    const defaults = getDefaultSmtpClientProperties();
    expect(defaults.port).toBe(587);
    expect(defaults.connectTimeout).toBe(10000);
    expect(defaults.readTimeout).toBe(10000);
    expect(defaults.tls).toEqual({ rejectUnauthorized: true });
  });

  it('should merge the tls block field by field', () => {
    const props = createSmtpClientProperties({ host: 'relay.test', tls: { servername: 'mx.relay.test' } });
    expect(props.host).toBe('relay.test');
    expect(props.tls).toEqual({ rejectUnauthorized: true, servername: 'mx.relay.test' });
  });

  it('should prefer messageIdDomain over ehloDomain', () => {
    expect(getMessageIdDomain(createSmtpClientProperties({ ehloDomain: 'a.test', messageIdDomain: 'b.test' }))).toBe(
      'b.test'
    );
    expect(getMessageIdDomain(createSmtpClientProperties({ ehloDomain: 'a.test' }))).toBe('a.test');
  });

  describe('validateSmtpClientProperties', () => {
    it('should accept complete settings', () => {
      const props = createSmtpClientProperties({
        host: 'relay.test',
        username: 'mailer@example.com',
        password: 'test-secret',
        from: 'mailer@example.com',
      });
      expect(validateSmtpClientProperties(props)).toEqual([]);
    });

    it('should require credentials', () => {
      const props = createSmtpClientProperties({ host: 'relay.test', from: 'mailer@example.com' });
      expect(validateSmtpClientProperties(props)).toEqual([
        'SMTP username is required',
        'SMTP password is required',
      ]);
    });

    it('should report every problem', () => {
      const props = createSmtpClientProperties({
        host: '',
        port: 70000,
        connectTimeout: 0,
        readTimeout: -1,
        from: '',
        ehloDomain: 'example.com\r\nRSET',
      });

      expect(validateSmtpClientProperties(props)).toEqual([
        'SMTP host is required',
        'SMTP port must be between 1 and 65535 (got 70000)',
        'Connect timeout must be greater than zero',
        'Read timeout must be greater than zero',
        'SMTP username is required',
        'SMTP password is required',
        'Sender address is required',
        'ehloDomain must not contain line breaks',
      ]);
    });
  });
});
