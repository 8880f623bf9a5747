import type { FollowupExchange } from '../ai/prompts';

export type CallSessionId = string;

/** Who owns the line right now. Changed only through CallSession's named transitions. */
export type CallPhase = 'CONNECTED' | 'SPEAKING' | 'LISTENING' | 'TEARING_DOWN';

export interface TranscriptEntry {
  questionIndex: number;
  speaker: 'ai' | 'user';
  text: string;
  at: Date;
}

export interface AnswerRecord {
  questionIndex: number;
  answer: string;
  responseType: string;
  extractedValues: Record<string, string>;
  followups: FollowupExchange[];
}

export interface CallSessionMetrics {
  createdAt: Date;
  startedAt?: Date;
  lastActivityAt: Date;
  turns: number;
  callerSpoke: boolean;
}

export interface CallRecord {
  sessionId: CallSessionId;
  callSid?: string;
  streamSid?: string;
  phoneNumber?: string;
  questionCount: number;
  questionIndex: number;
  reachedTerminal: boolean;
  callerSpoke: boolean;
  streamStarted: boolean;
  endReason: string;
  startedAt: Date;
  endedAt: Date;
  answers: AnswerRecord[];
  transcript: TranscriptEntry[];
}

/** Receives the finished call. Implementations must not throw synchronously. */
export type CallRecordSink = (record: CallRecord) => Promise<void>;
