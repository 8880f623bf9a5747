import type { RecognizerEvent } from '../stt/types';
import { countWords, endsWithTerminalPunctuation, mergeTranscript } from '../stt/transcriptMerge';

export type EndpointPhase = 'COLLECTING' | 'FALLBACK' | 'SILENCE';

export type EndpointAction = { kind: 'finalize'; text: string } | { kind: 'reprompt' };

export interface EndpointConfig {
  fallbackMs: number;
  repromptMs: number;
  confidenceThreshold: number;
  fallbackConfidenceThreshold: number;
  /** Silence after punctuated text. */
  punctuatedSilenceMs: number;
  /** Silence after text that ends mid-thought. */
  unpunctuatedSilenceMs: number;
  /** Turn timer without an end-of-utterance flag, short and long utterances. */
  shortTurnMs: number;
  longTurnMs: number;
  longUtteranceWords: number;
}

export const DEFAULT_ENDPOINT_CONFIG: EndpointConfig = {
  fallbackMs: 300,
  repromptMs: 5000,
  confidenceThreshold: 0.88,
  fallbackConfidenceThreshold: 0.8,
  punctuatedSilenceMs: 1000,
  unpunctuatedSilenceMs: 1400,
  shortTurnMs: 1000,
  longTurnMs: 1200,
  longUtteranceWords: 30,
};

export function silenceThresholdMs(text: string, config: EndpointConfig = DEFAULT_ENDPOINT_CONFIG): number {
  return endsWithTerminalPunctuation(text) ? config.punctuatedSilenceMs : config.unpunctuatedSilenceMs;
}

export function turnThresholdMs(text: string, config: EndpointConfig = DEFAULT_ENDPOINT_CONFIG): number {
  return countWords(text) < config.longUtteranceWords ? config.shortTurnMs : config.longTurnMs;
}

/**
 * Decides when the caller has finished a turn.
 *
 * Time is passed in by the caller so the machine can be driven by a poll loop
 * in production and by explicit timestamps in tests. Actions are only ever
 * produced by `tick`; `onEvent` just updates state.
 */
export class EndpointDetector {
  private phaseValue: EndpointPhase = 'COLLECTING';
  private buffer = '';
  private previewText = '';
  private lastTextAt: number;
  private lastActivityAt: number;
  private fallbackDeadline = 0;
  private silenceStartedAt = 0;

  constructor(
    private readonly config: EndpointConfig = DEFAULT_ENDPOINT_CONFIG,
    now = Date.now(),
  ) {
    this.lastTextAt = now;
    this.lastActivityAt = now;
  }

  public get phase(): EndpointPhase {
    return this.phaseValue;
  }

  public get text(): string {
    return this.buffer;
  }

  /** Everything heard this turn, including fragments below the confidence gate. */
  public get preview(): string {
    return this.previewText;
  }

  public onEvent(event: RecognizerEvent, now: number): void {
    const transcript = event.transcript.trim();

    if (transcript !== '') {
      this.lastActivityAt = now;
      if (!event.isFinal) {
        this.lastTextAt = now;
      }
    }

    if (transcript !== '' && event.isFinal) {
      this.previewText = mergeTranscript(this.previewText, transcript);
      // Finals below the gate never move the turn timer.
      if (event.confidence >= this.currentConfidenceThreshold()) {
        this.lastTextAt = now;
        this.buffer = mergeTranscript(this.buffer, transcript);
        if (this.phaseValue === 'FALLBACK') {
          this.fallbackDeadline = now + this.config.fallbackMs;
        } else if (this.phaseValue === 'SILENCE') {
          this.phaseValue = 'COLLECTING';
        }
      }
    }

    if (event.speechFinal && this.buffer !== '') {
      this.phaseValue = 'FALLBACK';
      this.fallbackDeadline = now + this.config.fallbackMs;
    }
  }

  public tick(now: number, speaking: boolean): EndpointAction | null {
    if (speaking) {
      this.lastActivityAt = now;
      return null;
    }

    if (this.phaseValue === 'FALLBACK' && now >= this.fallbackDeadline) {
      this.phaseValue = 'SILENCE';
      this.silenceStartedAt = this.fallbackDeadline;
    }

    if (this.phaseValue === 'SILENCE') {
      if (this.buffer === '') {
        this.phaseValue = 'COLLECTING';
      } else if (now - this.silenceStartedAt >= silenceThresholdMs(this.buffer, this.config)) {
        return this.finalize(now);
      }
    }

    if (this.phaseValue === 'COLLECTING' && this.buffer !== '') {
      if (now - this.lastTextAt >= turnThresholdMs(this.buffer, this.config)) {
        return this.finalize(now);
      }
    }

    if (this.buffer === '' && now - this.lastActivityAt >= this.config.repromptMs) {
      this.lastActivityAt = now;
      return { kind: 'reprompt' };
    }

    return null;
  }

  /** Drops the current turn and restarts the silence clocks. */
  public reset(now: number): void {
    this.phaseValue = 'COLLECTING';
    this.buffer = '';
    this.previewText = '';
    this.lastTextAt = now;
    this.lastActivityAt = now;
    this.fallbackDeadline = 0;
    this.silenceStartedAt = 0;
  }

  private currentConfidenceThreshold(): number {
    return this.phaseValue === 'FALLBACK'
      ? this.config.fallbackConfidenceThreshold
      : this.config.confidenceThreshold;
  }

  private finalize(now: number): EndpointAction {
    const text = this.buffer;
    this.reset(now);
    return { kind: 'finalize', text };
  }
}
