export interface RecognizerEvent {
  transcript: string;
  confidence: number;
  isFinal: boolean;
  /** Recognizer's end-of-utterance flag. */
  speechFinal: boolean;
}

export interface RecognizerStream {
  readonly closed: boolean;
  send(audio: Buffer): void;
  /** Resolves with the next event, or null once `timeoutMs` elapses or the stream closes. */
  next(timeoutMs: number): Promise<RecognizerEvent | null>;
  close(): Promise<void>;
}

export interface RecognizerOptions {
  encoding: 'mulaw';
  sampleRateHz: number;
  logContext?: Record<string, unknown>;
}

export type RecognizerFactory = (options: RecognizerOptions) => Promise<RecognizerStream>;
