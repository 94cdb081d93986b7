import { BadRequestException } from '@nestjs/common';
import { parseOrThrow } from './parse-or-throw';
import { jobIdParamSchema, sendEmailBodySchema } from './schemas';

function badRequestBody(parse: () => unknown): unknown {
  try {
    parse();
  } catch (error) {
    if (error instanceof BadRequestException) {
      return error.getResponse();
    }
    throw error;
  }
  throw new Error('expected a BadRequestException');
}

const validBody = {
  to: ['user@example.com'],
  subject: 'Welcome',
  body: '<p>Hello</p>',
};

describe('Zod Schema Validation', () => {
  describe('sendEmailBodySchema', () => {
    it('should parse a minimal body and fill defaults', () => {
      const result = parseOrThrow(sendEmailBodySchema, validBody);

      expect(result).toEqual({
        to: ['user@example.com'],
        cc: [],
        bcc: [],
        subject: 'Welcome',
        body: '<p>Hello</p>',
        metadata: {},
      });
    });

    it('should parse every optional field', () => {
      const result = parseOrThrow(sendEmailBodySchema, {
        ...validBody,
        client_message_id: ' order-42 ',
        cc: ['cc@example.com'],
        text: 'Hello',
        template_id: 'welcome',
        template_vars: { name: 'Ada' },
        metadata: { campaign: 'spring' },
        priority: 1,
        scheduled_for: '2024-03-01T12:00:00Z',
      });

      expect(result.client_message_id).toBe('order-42');
      expect(result.priority).toBe(1);
      expect(result.scheduled_for).toEqual(new Date('2024-03-01T12:00:00Z'));
      expect(result.template_vars).toEqual({ name: 'Ada' });
    });

    it('should accept a template reference instead of a body', () => {
      const { body: _body, ...rest } = validBody;

      const result = parseOrThrow(sendEmailBodySchema, {
        ...rest,
        template_id: 'welcome',
      });

      expect(result.body).toBeUndefined();
      expect(result.template_id).toBe('welcome');
    });

    it('should accept a plain-text body on its own', () => {
      const { body: _body, ...rest } = validBody;

      const result = parseOrThrow(sendEmailBodySchema, { ...rest, text: 'Hello' });

      expect(result.body).toBeUndefined();
      expect(result.text).toBe('Hello');
    });

    it('should require a body, text or template', () => {
      const { body: _body, ...rest } = validBody;

      expect(badRequestBody(() => parseOrThrow(sendEmailBodySchema, rest))).toEqual({
        message: 'Invalid request',
        errors: [{ path: 'body', message: 'either body, text or template_id is required' }],
      });
    });

    it('should reject an empty recipient list', () => {
      expect(
        badRequestBody(() => parseOrThrow(sendEmailBodySchema, { ...validBody, to: [] })),
      ).toEqual({
        message: 'Invalid request',
        errors: [{ path: 'to', message: 'to must contain at least one recipient' }],
      });
    });

    it('should report every invalid field, sorted by path', () => {
      expect(
        badRequestBody(() =>
          parseOrThrow(sendEmailBodySchema, {
            ...validBody,
            to: ['not-an-address'],
            priority: 11,
            subject: '',
          }),
        ),
      ).toEqual({
        message: 'Invalid request',
        errors: [
          { path: 'priority', message: 'priority must be at most 10' },
          { path: 'subject', message: 'subject must be a non-empty string' },
          { path: 'to.0', message: 'must be a valid email address' },
        ],
      });
    });

    it('should reject a subject longer than 998 characters', () => {
      expect(() =>
        parseOrThrow(sendEmailBodySchema, { ...validBody, subject: 's'.repeat(999) }),
      ).toThrow(BadRequestException);
    });

    it('should reject a malformed scheduled_for', () => {
      expect(
        badRequestBody(() =>
          parseOrThrow(sendEmailBodySchema, { ...validBody, scheduled_for: 'tomorrow' }),
        ),
      ).toEqual({
        message: 'Invalid request',
        errors: [
          {
            path: 'scheduled_for',
            message: 'scheduled_for must be an ISO-8601 timestamp',
          },
        ],
      });
    });

    it('should reject a non-object body', () => {
      expect(() => parseOrThrow(sendEmailBodySchema, 'hello')).toThrow(
        BadRequestException,
      );
    });
  });

  describe('jobIdParamSchema', () => {
    it('should coerce a numeric path parameter', () => {
      expect(parseOrThrow(jobIdParamSchema, '42')).toBe(42);
    });

    it.each(['abc', '0', '-3', '1.5'])('should reject %s', (value) => {
      expect(() => parseOrThrow(jobIdParamSchema, value)).toThrow(
        BadRequestException,
      );
    });

    it('should reject an id beyond the safe integer range', () => {
      expect(
        badRequestBody(() => parseOrThrow(jobIdParamSchema, '99999999999999999999')),
      ).toEqual({
        message: 'Invalid request',
        errors: [{ path: 'too_big', message: 'id is out of range' }],
      });
    });
  });
});
