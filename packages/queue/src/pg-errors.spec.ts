import { isConstraintViolation, isTransientDbError } from './pg-errors';

const withCode = (code: string) => Object.assign(new Error(code), { code });

describe('isTransientDbError', () => {
  it.each(['08006', '08001', '40001', '40P01', '57P01', 'ECONNRESET', 'ETIMEDOUT'])(
    'should treat %s as transient',
    (code) => {
      expect(isTransientDbError(withCode(code))).toBe(true);
    },
  );

  it.each(['42P01', '23505', '22P02'])('should treat %s as permanent', (code) => {
    expect(isTransientDbError(withCode(code))).toBe(false);
  });

  it('should recognise a dropped connection by its message', () => {
    expect(
      isTransientDbError(new Error('Connection terminated unexpectedly')),
    ).toBe(true);
  });

  it('should treat non-errors as permanent', () => {
    expect(isTransientDbError('boom')).toBe(false);
  });
});

describe('isConstraintViolation', () => {
  it('should match integrity constraint codes only', () => {
    expect(isConstraintViolation(withCode('23514'))).toBe(true);
    expect(isConstraintViolation(withCode('42P01'))).toBe(false);
    expect(isConstraintViolation(new Error('no code'))).toBe(false);
  });
});
