import { z } from 'zod';
import { MAX_PRIORITY, MIN_PRIORITY } from '@mailq/queue';

// RFC 5322 caps a header line at 998 characters.
const MAX_SUBJECT_LENGTH = 998;
const MAX_RECIPIENTS = 100;

const emailAddressSchema = z
  .string()
  .trim()
  .email('must be a valid email address');

const addressListSchema = z
  .array(emailAddressSchema)
  .max(MAX_RECIPIENTS, `at most ${MAX_RECIPIENTS} addresses are allowed`);

const optionalTextSchema = (field: string) =>
  z.string().min(1, `${field} must be a non-empty string`).optional();

export const sendEmailBodySchema = z
  .object({
    client_message_id: z
      .string()
      .trim()
      .min(1, 'client_message_id must be a non-empty string')
      .max(255, 'client_message_id must be at most 255 characters')
      .optional(),
    to: addressListSchema.min(1, 'to must contain at least one recipient'),
    cc: addressListSchema.default([]),
    bcc: addressListSchema.default([]),
    subject: z
      .string()
      .min(1, 'subject must be a non-empty string')
      .max(
        MAX_SUBJECT_LENGTH,
        `subject must be at most ${MAX_SUBJECT_LENGTH} characters`,
      ),
    body: optionalTextSchema('body'),
    text: optionalTextSchema('text'),
    template_id: z
      .string()
      .trim()
      .min(1, 'template_id must be a non-empty string')
      .optional(),
    template_vars: z.record(z.unknown()).optional(),
    metadata: z.record(z.unknown()).default({}),
    priority: z
      .number()
      .int('priority must be an integer')
      .min(MIN_PRIORITY, `priority must be at least ${MIN_PRIORITY}`)
      .max(MAX_PRIORITY, `priority must be at most ${MAX_PRIORITY}`)
      .optional(),
    scheduled_for: z
      .string()
      .datetime({ offset: true, message: 'scheduled_for must be an ISO-8601 timestamp' })
      .transform((value) => new Date(value))
      .optional(),
  })
  .refine(
    (body) =>
      body.body !== undefined ||
      body.text !== undefined ||
      body.template_id !== undefined,
    {
      message: 'either body, text or template_id is required',
      path: ['body'],
    },
  );

export type SendEmailBody = z.output<typeof sendEmailBodySchema>;

export const jobIdParamSchema = z.coerce
  .number()
  .int('id must be a positive integer')
  .positive('id must be a positive integer')
  .max(Number.MAX_SAFE_INTEGER, 'id is out of range');
