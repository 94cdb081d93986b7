import { randomUUID } from 'node:crypto';
import { Inject, Injectable } from '@nestjs/common';
import { JOB_STORE } from '@mailq/queue';
import type { JobStore } from '@mailq/queue';
import { APP_CONFIG, logger } from '@mailq/shared';
import type { AppConfig } from '@mailq/shared';
import { toHttpException } from '../errors';
import type { SendEmailBody } from '../validation/schemas';

export type EmailAccepted = {
  status: 'accepted';
  queued: true;
  message_id: string;
  job_id: number;
};

@Injectable()
export class EmailsService {
  constructor(
    @Inject(JOB_STORE) private readonly store: JobStore,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  async submit(body: SendEmailBody): Promise<EmailAccepted> {
    const messageId = body.client_message_id ?? randomUUID();

    let jobId: number;
    try {
      jobId = await this.store.enqueue({
        idempotencyKey: body.client_message_id,
        recipients: body.to,
        cc: body.cc,
        bcc: body.bcc,
        subject: body.subject,
        bodyHtml: body.body,
        bodyText: body.text,
        templateId: body.template_id,
        templateVars: body.template_vars,
        metadata: { ...body.metadata, message_id: messageId },
        priority: body.priority,
        scheduledFor: body.scheduled_for,
        maxRetries: this.config.retry.maxRetries,
      });
    } catch (error) {
      throw toHttpException(error);
    }

    logger.info(
      {
        service: 'api',
        job_id: jobId,
        message_id: messageId,
        recipients: body.to.length + body.cc.length + body.bcc.length,
      },
      'email queued',
    );

    return {
      status: 'accepted',
      queued: true,
      message_id: messageId,
      job_id: jobId,
    };
  }
}
