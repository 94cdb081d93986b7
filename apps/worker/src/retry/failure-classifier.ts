import { DeliveryError } from '@mailq/shared';
import type { FailureType } from './retry.policy';

/**
 * Classifies a delivery failure as either 'transient' or 'permanent'.
 * The transport's own verdict wins; anything else is judged by its message.
 */
export function classifyFailure(error: unknown): FailureType {
  if (error instanceof DeliveryError) {
    return error.transient ? 'transient' : 'permanent';
  }
  // Conservative classification: most errors are transient
  // Only mark as permanent if it's clearly a recipient/auth/content problem
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (
      message.includes('invalid recipient') ||
      message.includes('invalid address') ||
      message.includes('no recipients defined') ||
      message.includes('authentication failed') ||
      message.includes('malformed')
    ) {
      return 'permanent';
    }
  }
  // Default: transient (network errors, timeouts, throttling, etc.)
  return 'transient';
}
