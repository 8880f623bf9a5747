import type { CallRecord } from '../calls/types';

export type CallCategory = 'NO_PICKUP' | 'BUSY_DISCONNECT' | 'DISCONNECTED' | 'COMPLETED';

export function categorizeCall(
  record: Pick<CallRecord, 'streamStarted' | 'reachedTerminal' | 'callerSpoke' | 'questionIndex'>,
): CallCategory {
  if (!record.streamStarted) {
    return 'NO_PICKUP';
  }
  if (record.reachedTerminal) {
    return 'COMPLETED';
  }
  // Hung up on the greeting, or never said a word.
  if (!record.callerSpoke || record.questionIndex === 0) {
    return 'BUSY_DISCONNECT';
  }
  return 'DISCONNECTED';
}
