import {
  BadRequestException,
  ServiceUnavailableException,
} from '@nestjs/common';
import type { JobStore } from '@mailq/queue';
import { loadConfig, StoreError } from '@mailq/shared';
import { parseOrThrow } from '../validation/parse-or-throw';
import { sendEmailBodySchema } from '../validation/schemas';
import { EmailsService } from './emails.service';

const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('EmailsService', () => {
  let service: EmailsService;
  let store: { enqueue: jest.Mock };

  beforeEach(() => {
    store = { enqueue: jest.fn() };
    service = new EmailsService(
      store as unknown as JobStore,
      loadConfig({ EMAIL_RETRY_MAX_ATTEMPTS: '4' }),
    );
  });

  const body = (extra: Record<string, unknown> = {}) =>
    parseOrThrow(sendEmailBodySchema, {
      to: ['user@example.com'],
      subject: 'Welcome',
      body: '<p>Hello</p>',
      ...extra,
    });

  it('should enqueue the message and accept it', async () => {
    store.enqueue.mockResolvedValue(7);

    const result = await service.submit(
      body({ client_message_id: 'order-42', priority: 2, text: 'Hello' }),
    );

    expect(result).toEqual({
      status: 'accepted',
      queued: true,
      message_id: 'order-42',
      job_id: 7,
    });
    expect(store.enqueue).toHaveBeenCalledWith({
      idempotencyKey: 'order-42',
      recipients: ['user@example.com'],
      cc: [],
      bcc: [],
      subject: 'Welcome',
      bodyHtml: '<p>Hello</p>',
      bodyText: 'Hello',
      templateId: undefined,
      templateVars: undefined,
      metadata: { message_id: 'order-42' },
      priority: 2,
      scheduledFor: undefined,
      maxRetries: 4,
    });
  });

  it('should generate a message id when the client sends none', async () => {
    store.enqueue.mockResolvedValue(8);

    const result = await service.submit(body({ metadata: { campaign: 'spring' } }));

    expect(result.message_id).toMatch(UUID_PATTERN);
    const [job] = store.enqueue.mock.calls[0];
    expect(job.idempotencyKey).toBeUndefined();
    expect(job.metadata).toEqual({
      campaign: 'spring',
      message_id: result.message_id,
    });
  });

  it('should answer 400 when the store rejects the job', async () => {
    store.enqueue.mockRejectedValue(
      new StoreError('enqueue rejected: recipient set is empty', 'constraint'),
    );

    await expect(service.submit(body())).rejects.toBeInstanceOf(
      BadRequestException,
    );
  });

  it('should answer 503 when the store is unreachable', async () => {
    store.enqueue.mockRejectedValue(
      new StoreError('enqueue failed after 3 attempts: ECONNREFUSED', 'connectivity'),
    );

    await expect(service.submit(body())).rejects.toBeInstanceOf(
      ServiceUnavailableException,
    );
  });

  it('should rethrow unexpected errors untouched', async () => {
    const failure = new TypeError('unexpected');
    store.enqueue.mockRejectedValue(failure);

    await expect(service.submit(body())).rejects.toBe(failure);
  });
});
