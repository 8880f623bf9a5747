export interface ScriptedQuestion {
  /** 1-based position in the interview; 0 is the greeting. */
  index: number;
  text: string;
  expectedAnswerKind: string;
  /** Classifier label -> description. */
  categories: Record<string, string>;
  /** Classifier label -> follow-up text; empty string means "no follow-up". */
  followupTemplates: Record<string, string>;
  maxFollowups: number;
  /** Notice-style questions compare a parsed duration against this many days. */
  thresholdDays?: number;
}

export type QuestionAudio = { ready: true; audio: Buffer } | { ready: false };

export interface QuestionSource {
  readonly questionCount: number;
  getQuestion(index: number): ScriptedQuestion | undefined;
  getAudio(index: number): QuestionAudio;
  storeAudio(index: number, audio: Buffer): void;
}

export interface FillerSource {
  getFiller(questionIndex: number): string;
}
