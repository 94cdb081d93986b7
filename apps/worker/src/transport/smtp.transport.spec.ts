import { DeliveryError } from '@mailq/shared';
import { SmtpTransport, toDeliveryError } from './smtp.transport';
import type { MailTransporter, SmtpTransportConfig } from './smtp.transport';

const config: SmtpTransportConfig = {
  host: 'smtp.test',
  port: 587,
  secure: false,
  user: 'mailer',
  password: 'test-secret',
  from: { email: 'noreply@example.com', name: 'Mail Queue' },
  timeoutMs: 5_000,
};

function smtpError(message: string, fields: { code?: string; responseCode?: number }) {
  return Object.assign(new Error(message), fields);
}

describe('SmtpTransport', () => {
  let transporter: { sendMail: jest.Mock; verify: jest.Mock; close: jest.Mock };
  let transport: SmtpTransport;

  beforeEach(() => {
    transporter = {
      sendMail: jest.fn(),
      verify: jest.fn(),
      close: jest.fn(),
    };
    transport = new SmtpTransport(
      config,
      transporter as unknown as MailTransporter,
    );
  });

  describe('send', () => {
    it('should hand the message to nodemailer', async () => {
      transporter.sendMail.mockResolvedValue({
        messageId: '<m-1@example.com>',
        accepted: ['user@example.com'],
        rejected: [],
      });

      const result = await transport.send(
        { to: ['user@example.com'], cc: [], bcc: ['audit@example.com'] },
        { subject: 'Welcome', html: '<p>Hi</p>', text: 'Hi' },
      );

      expect(result).toEqual({ messageId: '<m-1@example.com>' });
      expect(transporter.sendMail).toHaveBeenCalledWith({
        from: { name: 'Mail Queue', address: 'noreply@example.com' },
        to: ['user@example.com'],
        cc: undefined,
        bcc: ['audit@example.com'],
        subject: 'Welcome',
        html: '<p>Hi</p>',
        text: 'Hi',
      });
    });

    it('should fail permanently for a message without a body', async () => {
      const result = transport.send(
        { to: ['user@example.com'], cc: [], bcc: [] },
        { subject: 'Welcome', templateId: 'welcome' },
      );

      await expect(result).rejects.toBeInstanceOf(DeliveryError);
      await expect(result).rejects.toMatchObject({
        transient: false,
        code: 'ENOCONTENT',
        message: 'template welcome was not rendered before delivery',
      });
      expect(transporter.sendMail).not.toHaveBeenCalled();
    });

    it('should fail permanently when every recipient is rejected', async () => {
      transporter.sendMail.mockResolvedValue({
        messageId: '<m-2@example.com>',
        accepted: [],
        rejected: ['nobody@example.com'],
      });

      await expect(
        transport.send(
          { to: ['nobody@example.com'], cc: [], bcc: [] },
          { subject: 'Welcome', text: 'Hi' },
        ),
      ).rejects.toMatchObject({
        transient: false,
        code: 'EENVELOPE',
        message: 'all recipients rejected: nobody@example.com',
      });
    });

    it('should classify nodemailer errors', async () => {
      transporter.sendMail.mockRejectedValue(
        smtpError('Greeting never received', { code: 'ETIMEDOUT' }),
      );

      await expect(
        transport.send(
          { to: ['user@example.com'], cc: [], bcc: [] },
          { subject: 'Welcome', text: 'Hi' },
        ),
      ).rejects.toMatchObject({
        transient: true,
        code: 'ETIMEDOUT',
        message: 'smtp delivery failed: Greeting never received',
      });
    });
  });

  describe('verify', () => {
    it('should report a reachable server', async () => {
      transporter.verify.mockResolvedValue(true);

      expect(await transport.verify()).toBe(true);
    });

    it('should report an unreachable server without throwing', async () => {
      transporter.verify.mockRejectedValue(new Error('connect ECONNREFUSED'));

      expect(await transport.verify()).toBe(false);
    });
  });

  it('should close the transporter', async () => {
    await transport.close();

    expect(transporter.close).toHaveBeenCalledTimes(1);
  });
});

describe('toDeliveryError', () => {
  it.each([
    [421, true],
    [450, true],
    [550, false],
    [553, false],
  ])('should map SMTP reply %i to transient=%s', (responseCode, transient) => {
    const error = toDeliveryError(
      smtpError(`${responseCode} reply`, { code: 'EENVELOPE', responseCode }),
    );

    expect(error.transient).toBe(transient);
  });

  it.each([
    ['EAUTH', false],
    ['EMESSAGE', false],
    ['ECONNECTION', true],
    ['ESOCKET', true],
    ['EUNKNOWN', true],
  ])('should map code %s to transient=%s', (code, transient) => {
    expect(toDeliveryError(smtpError('failed', { code })).transient).toBe(
      transient,
    );
  });

  it('should treat a plain error as transient', () => {
    const error = toDeliveryError(new Error('socket hang up'));

    expect(error).toMatchObject({
      transient: true,
      code: undefined,
      message: 'smtp delivery failed: socket hang up',
    });
  });

  it('should pass a DeliveryError through', () => {
    const original = new DeliveryError('already classified', false, 'X');

    expect(toDeliveryError(original)).toBe(original);
  });
});
