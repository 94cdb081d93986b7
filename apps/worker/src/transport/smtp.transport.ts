import * as nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import { DeliveryError, errorMessage, logger } from '@mailq/shared';
import type { AppConfig } from '@mailq/shared';
import type {
  MessageContent,
  Recipients,
  SendResult,
  Transport,
} from './transport.types';

export type SmtpTransportConfig = AppConfig['smtp'] & {
  timeoutMs: number;
};

export type MailTransporter = Pick<
  Transporter<SMTPTransport.SentMessageInfo>,
  'sendMail' | 'verify' | 'close'
>;

// nodemailer error codes that say nothing about the message itself.
const TRANSIENT_CODES = new Set([
  'ECONNECTION',
  'ETIMEDOUT',
  'ESOCKET',
  'EDNS',
  'ECONNRESET',
  'ECONNREFUSED',
  'EPROTOCOL',
]);

const PERMANENT_CODES = new Set(['EAUTH', 'EENVELOPE', 'EMESSAGE']);

/**
 * SMTP delivery through nodemailer, one transporter per worker process.
 */
export class SmtpTransport implements Transport {
  private readonly transporter: MailTransporter;

  constructor(
    private readonly config: SmtpTransportConfig,
    transporter?: MailTransporter,
  ) {
    this.transporter =
      transporter ??
      nodemailer.createTransport({
        host: config.host,
        port: config.port,
        secure: config.secure,
        auth:
          config.user !== undefined
            ? { user: config.user, pass: config.password }
            : undefined,
        connectionTimeout: config.timeoutMs,
        greetingTimeout: config.timeoutMs,
        socketTimeout: config.timeoutMs,
      });

    logger.info(
      { service: 'worker', host: config.host, port: config.port },
      'smtp transport configured',
    );
  }

  async send(recipients: Recipients, content: MessageContent): Promise<SendResult> {
    if (!content.html && !content.text) {
      throw new DeliveryError(
        content.templateId
          ? `template ${content.templateId} was not rendered before delivery`
          : 'message has no body',
        false,
        'ENOCONTENT',
      );
    }

    let info: SMTPTransport.SentMessageInfo;
    try {
      info = await this.transporter.sendMail({
        from: { name: this.config.from.name, address: this.config.from.email },
        to: recipients.to,
        cc: recipients.cc.length > 0 ? recipients.cc : undefined,
        bcc: recipients.bcc.length > 0 ? recipients.bcc : undefined,
        subject: content.subject,
        html: content.html,
        text: content.text,
      });
    } catch (error) {
      throw toDeliveryError(error);
    }

    if (info.accepted.length === 0 && info.rejected.length > 0) {
      throw new DeliveryError(
        `all recipients rejected: ${info.rejected
          .map((entry) => (typeof entry === 'string' ? entry : entry.address))
          .join(', ')}`,
        false,
        'EENVELOPE',
      );
    }

    return { messageId: info.messageId };
  }

  async verify(): Promise<boolean> {
    try {
      await this.transporter.verify();
      logger.info({ service: 'worker' }, 'smtp connection verified');
      return true;
    } catch (error) {
      logger.error(
        { service: 'worker', error: errorMessage(error) },
        'smtp connection verification failed',
      );
      return false;
    }
  }

  async close(): Promise<void> {
    this.transporter.close();
  }
}

/**
 * Maps a nodemailer failure onto a DeliveryError.
 * SMTP reply codes win over nodemailer codes: 4xx is transient, 5xx permanent.
 */
export function toDeliveryError(error: unknown): DeliveryError {
  if (error instanceof DeliveryError) {
    return error;
  }

  const message = `smtp delivery failed: ${errorMessage(error)}`;
  const code = readProperty(error, 'code');
  const responseCode = readProperty(error, 'responseCode');
  const codeText = typeof code === 'string' ? code : undefined;

  if (typeof responseCode === 'number') {
    if (responseCode >= 400 && responseCode < 500) {
      return new DeliveryError(message, true, codeText, { cause: error });
    }
    if (responseCode >= 500) {
      return new DeliveryError(message, false, codeText, { cause: error });
    }
  }

  if (codeText !== undefined && PERMANENT_CODES.has(codeText)) {
    return new DeliveryError(message, false, codeText, { cause: error });
  }
  if (codeText !== undefined && TRANSIENT_CODES.has(codeText)) {
    return new DeliveryError(message, true, codeText, { cause: error });
  }
  return new DeliveryError(message, true, codeText, { cause: error });
}

function readProperty(value: unknown, key: string): unknown {
  if (typeof value === 'object' && value !== null && key in value) {
    return Reflect.get(value, key);
  }
  return undefined;
}
