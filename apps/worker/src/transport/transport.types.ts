import type { Job } from '@mailq/queue';

/** Injection token for the active {@link Transport}. */
export const TRANSPORT = Symbol('TRANSPORT');

export type Recipients = {
  to: string[];
  cc: string[];
  bcc: string[];
};

export type MessageContent = {
  subject: string;
  html?: string;
  text?: string;
  templateId?: string;
  templateVars?: Record<string, unknown>;
};

export type SendResult = {
  messageId: string;
};

/**
 * Outbound delivery. `send` rejects with a DeliveryError whose `transient`
 * flag decides between retry and immediate failure.
 */
export interface Transport {
  send(recipients: Recipients, content: MessageContent): Promise<SendResult>;
  verify(): Promise<boolean>;
  close(): Promise<void>;
}

export function recipientsOf(job: Job): Recipients {
  return { to: job.recipients, cc: job.cc, bcc: job.bcc };
}

export function contentOf(job: Job): MessageContent {
  return {
    subject: job.subject,
    html: job.body_html ?? undefined,
    text: job.body_text ?? undefined,
    templateId: job.template_id ?? undefined,
    templateVars: job.template_vars ?? undefined,
  };
}
