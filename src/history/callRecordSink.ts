import { log } from '../log';
import type { CallRecord, CallRecordSink } from '../calls/types';
import { categorizeCall } from './callCategorization';
import { buildCallOutcome, type OutcomePublisher } from './outcomePublisher';
import type { TranscriptRecorder } from './transcriptStore';

/**
 * Post-call hand-off: persist the transcript, categorize, publish.
 * Each step is independent so a failed write does not lose the outcome.
 */
export function createCallRecordSink(recorder: TranscriptRecorder, publisher: OutcomePublisher): CallRecordSink {
  return async (record: CallRecord) => {
    const logContext = { session_id: record.sessionId, call_sid: record.callSid };

    try {
      await recorder.save(record);
    } catch (error) {
      log.error({ err: error, event: 'transcript_save_failed', ...logContext }, 'transcript save failed');
    }

    const category = categorizeCall(record);
    log.info({ event: 'call_categorized', category, end_reason: record.endReason, ...logContext }, 'call categorized');

    try {
      await publisher.publish(buildCallOutcome(record, category));
    } catch (error) {
      log.error({ err: error, event: 'call_outcome_publish_failed', ...logContext }, 'call outcome publish failed');
    }
  };
}
