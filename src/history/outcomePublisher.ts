import { log } from '../log';
import type { AnswerRecord, CallRecord } from '../calls/types';
import type { CallCategory } from './callCategorization';

export interface CallOutcome {
  callSid?: string;
  phoneNumber?: string;
  category: CallCategory;
  endReason: string;
  questionsAnswered: number;
  answers: AnswerRecord[];
  startedAt: string;
  endedAt: string;
}

export interface OutcomePublisher {
  publish(outcome: CallOutcome): Promise<void>;
}

export interface OutcomeListClient {
  rpush(key: string, value: string): Promise<number>;
}

export function buildCallOutcome(record: CallRecord, category: CallCategory): CallOutcome {
  return {
    callSid: record.callSid,
    phoneNumber: record.phoneNumber,
    category,
    endReason: record.endReason,
    questionsAnswered: record.answers.filter((answer) => answer.answer !== '').length,
    answers: record.answers,
    startedAt: record.startedAt.toISOString(),
    endedAt: record.endedAt.toISOString(),
  };
}

/** Appends outcomes as JSON to a Redis list for downstream consumers. */
export class RedisOutcomePublisher implements OutcomePublisher {
  constructor(
    private readonly client: OutcomeListClient,
    private readonly listKey: string,
  ) {}

  public async publish(outcome: CallOutcome): Promise<void> {
    const length = await this.client.rpush(this.listKey, JSON.stringify(outcome));
    log.info(
      { event: 'call_outcome_published', call_sid: outcome.callSid, category: outcome.category, list_length: length },
      'call outcome published',
    );
  }
}

export class LogOutcomePublisher implements OutcomePublisher {
  public async publish(outcome: CallOutcome): Promise<void> {
    log.info(
      {
        event: 'call_outcome',
        call_sid: outcome.callSid,
        category: outcome.category,
        questions_answered: outcome.questionsAnswered,
      },
      'call outcome',
    );
  }
}
