import { DeliveryError } from '@mailq/shared';
import { classifyFailure } from './failure-classifier';

describe('classifyFailure', () => {
  it('should follow the transport verdict', () => {
    expect(classifyFailure(new DeliveryError('421 busy', true))).toBe('transient');
    expect(classifyFailure(new DeliveryError('550 no such user', false))).toBe(
      'permanent',
    );
  });

  it.each([
    'Invalid recipient address',
    'No recipients defined',
    'Authentication failed',
    'Malformed message',
  ])('should treat "%s" as permanent', (message) => {
    expect(classifyFailure(new Error(message))).toBe('permanent');
  });

  it('should treat anything else as transient', () => {
    expect(classifyFailure(new Error('socket hang up'))).toBe('transient');
    expect(classifyFailure('unexpected')).toBe('transient');
  });
});
