import { DEFAULT_CLASSIFICATION, decodeClassification } from '../ai/classificationDecoder';
import { parseDurationDays } from '../ai/durationParser';
import { buildClassificationPrompt, buildFollowupPrompt, type FollowupExchange } from '../ai/prompts';
import type { Classification, ResponseClassifier } from '../ai/types';
import { log } from '../log';
import { CLOSING_TEXT, FALLBACK_FOLLOWUP_TEXT, GREETING_TEXT } from '../questions/phrases';
import type { QuestionSource, ScriptedQuestion } from '../questions/types';
import type { AnswerRecord, TranscriptEntry } from './types';

const NON_ANSWER_LABELS = new Set(['irrelevant', 'default']);
const PLACEHOLDER_PATTERN = /\{(\w+)\}/g;

export interface ConversationState {
  /** 0 is the greeting, 1..N scripted questions, N + 1 terminal. */
  questionIndex: number;
  followupAttempts: number;
  maxFollowupAttempts: number;
  followupHistory: FollowupExchange[];
  lastAnswerText: string;
  responseType?: string;
  extractedValues: Record<string, string>;
}

export type FlowCommand =
  | { kind: 'ask_question'; questionIndex: number; text: string; audio?: Buffer }
  | { kind: 'ask_followup'; questionIndex: number; text: string; firstFollowup: boolean }
  | { kind: 'end_call'; text: string }
  | { kind: 'none' };

export interface ConversationSummary {
  questionIndex: number;
  reachedTerminal: boolean;
  answers: AnswerRecord[];
  transcript: TranscriptEntry[];
}

export function isAnswerLabel(label: string): boolean {
  return !NON_ANSWER_LABELS.has(label);
}

export function templateFor(question: ScriptedQuestion, label: string): string {
  return Object.hasOwn(question.followupTemplates, label) ? question.followupTemplates[label].trim() : '';
}

/**
 * Whether the current question is done given the latest classification.
 * `followupTurn` is true when the caller was answering a follow-up.
 */
export function shouldAdvance(
  state: Pick<ConversationState, 'followupAttempts' | 'maxFollowupAttempts'>,
  classification: Classification,
  question: ScriptedQuestion,
  followupTurn: boolean,
): boolean {
  if (state.followupAttempts >= state.maxFollowupAttempts) {
    return true;
  }
  if (!classification.needsFollowup) {
    return true;
  }

  const answered = isAnswerLabel(classification.responseType);
  if (answered && templateFor(question, classification.responseType) === '') {
    return true;
  }
  return answered && followupTurn;
}

/**
 * Relabels a non-answer on a question with a day threshold when the caller's
 * words still parse as a duration.
 */
export function applyDurationThreshold(
  classification: Classification,
  question: ScriptedQuestion,
  answer: string,
): Classification {
  if (question.thresholdDays === undefined || isAnswerLabel(classification.responseType)) {
    return classification;
  }

  const days = parseDurationDays(classification.extractedValue ?? answer);
  if (days === null) {
    return classification;
  }

  let responseType = days < question.thresholdDays ? 'short_notice' : 'long_notice';
  if (days === 0 && Object.hasOwn(question.categories, 'immediate')) {
    responseType = 'immediate';
  }

  return {
    responseType,
    extractedValue: `${days} days`,
    needsFollowup: templateFor(question, responseType) !== '',
  };
}

export function fillTemplate(template: string, values: Record<string, string>): { text: string; resolved: boolean } {
  const text = template.replace(PLACEHOLDER_PATTERN, (match, key: string) =>
    Object.hasOwn(values, key) ? values[key] : match,
  );
  return { text, resolved: !/\{\w+\}/.test(text) };
}

export interface ConversationFlowDeps {
  questions: QuestionSource;
  classifier: ResponseClassifier;
  logContext?: Record<string, unknown>;
}

/**
 * Per-call question state machine. One instance per call; calls into it are
 * serialized by the session, and a turn arriving while another is being
 * classified is refused.
 */
export class ConversationFlow {
  private state?: ConversationState;
  private readonly answers: AnswerRecord[] = [];
  private readonly transcript: TranscriptEntry[] = [];
  private readonly logContext: Record<string, unknown>;
  private turnInFlight = false;
  private reachedTerminal = false;

  constructor(
    private readonly callSid: string,
    private readonly deps: ConversationFlowDeps,
  ) {
    this.logContext = deps.logContext ?? { call_sid: callSid };
  }

  public get current(): Readonly<ConversationState> | undefined {
    return this.state;
  }

  public get isTerminal(): boolean {
    return this.reachedTerminal;
  }

  /** Starts at the greeting and returns the text to speak. */
  public begin(): string {
    if (!this.state) {
      this.state = this.freshState(0, 0);
      this.record('ai', GREETING_TEXT);
    }
    return GREETING_TEXT;
  }

  /** Notes a prompt the session spoke outside the question script (re-prompts). */
  public recordPrompt(text: string): void {
    if (this.state) {
      this.record('ai', text);
    }
  }

  public async handleUtterance(text: string): Promise<FlowCommand> {
    const answer = text.trim();
    const state = this.state;
    if (!state) {
      log.warn({ event: 'conversation_state_missing', ...this.logContext }, 'utterance before conversation start');
      return { kind: 'none' };
    }
    if (answer === '' || this.reachedTerminal) {
      return { kind: 'none' };
    }
    if (this.turnInFlight) {
      log.warn({ event: 'conversation_turn_overlap', ...this.logContext }, 'utterance while turn in flight');
      return { kind: 'none' };
    }

    this.turnInFlight = true;
    try {
      this.record('user', answer);
      if (state.questionIndex === 0) {
        return await this.advance(state);
      }
      return await this.handleAnswer(state, answer);
    } finally {
      this.turnInFlight = false;
    }
  }

  /** Clears the state and hands back everything worth persisting. */
  public end(): ConversationSummary {
    const state = this.state;
    if (state && state.questionIndex > 0 && !this.reachedTerminal) {
      this.captureAnswer(state);
    }
    this.state = undefined;
    return {
      questionIndex: state?.questionIndex ?? 0,
      reachedTerminal: this.reachedTerminal,
      answers: [...this.answers],
      transcript: [...this.transcript],
    };
  }

  private async handleAnswer(state: ConversationState, answer: string): Promise<FlowCommand> {
    const question = this.deps.questions.getQuestion(state.questionIndex);
    if (!question) {
      log.warn(
        { event: 'question_missing', question_index: state.questionIndex, ...this.logContext },
        'question missing for state',
      );
      return this.advance(state);
    }

    const followupTurn = state.followupHistory.length > 0;
    if (followupTurn) {
      state.followupHistory[state.followupHistory.length - 1].answer = answer;
    }
    state.lastAnswerText = state.lastAnswerText ? `${state.lastAnswerText} ${answer}` : answer;

    const classification = applyDurationThreshold(await this.classify(question, answer, state), question, answer);
    state.responseType = classification.responseType;
    if (classification.extractedValue) {
      state.extractedValues.extracted_value = classification.extractedValue;
      state.extractedValues[classification.responseType] = classification.extractedValue;
    }

    log.info(
      {
        event: 'answer_classified',
        question_index: state.questionIndex,
        response_type: classification.responseType,
        needs_followup: classification.needsFollowup,
        followup_attempts: state.followupAttempts,
        ...this.logContext,
      },
      'answer classified',
    );

    if (shouldAdvance(state, classification, question, followupTurn)) {
      return this.advance(state);
    }

    const followupText = await this.resolveFollowup(state, question, classification, answer, followupTurn);
    state.followupHistory.push({ question: followupText, answer: '' });
    state.followupAttempts += 1;
    this.record('ai', followupText);

    return {
      kind: 'ask_followup',
      questionIndex: state.questionIndex,
      text: followupText,
      firstFollowup: state.followupAttempts === 1,
    };
  }

  private async classify(question: ScriptedQuestion, answer: string, state: ConversationState): Promise<Classification> {
    const prompt = buildClassificationPrompt({ question, answer, followups: state.followupHistory });
    let raw: string;
    try {
      raw = await this.deps.classifier.classify({ callSid: this.callSid, prompt });
    } catch (error) {
      log.error({ err: error, event: 'classification_failed', ...this.logContext }, 'classification failed');
      return { ...DEFAULT_CLASSIFICATION };
    }

    const decoded = decodeClassification(raw);
    if (!decoded.ok) {
      log.warn(
        { event: 'classification_unparseable', reason: decoded.error.reason, ...this.logContext },
        'classifier reply not parseable, using default',
      );
      return { ...DEFAULT_CLASSIFICATION };
    }
    return decoded.value;
  }

  private async resolveFollowup(
    state: ConversationState,
    question: ScriptedQuestion,
    classification: Classification,
    answer: string,
    followupTurn: boolean,
  ): Promise<string> {
    const previous = state.followupHistory[state.followupHistory.length - 1];
    if (followupTurn && previous && !isAnswerLabel(classification.responseType)) {
      return previous.question;
    }

    if (state.followupAttempts === 0) {
      const template = templateFor(question, classification.responseType) || templateFor(question, 'default');
      if (template !== '') {
        const filled = fillTemplate(template, state.extractedValues);
        if (filled.resolved) {
          return filled.text;
        }
      }
    }

    const generated = await this.deps.classifier.generateFollowup({
      callSid: this.callSid,
      prompt: buildFollowupPrompt({
        question,
        answer,
        followups: state.followupHistory,
        responseType: classification.responseType,
        extractedValues: state.extractedValues,
        attempt: state.followupAttempts + 1,
      }),
    });
    return generated ?? FALLBACK_FOLLOWUP_TEXT;
  }

  private async advance(state: ConversationState): Promise<FlowCommand> {
    if (state.questionIndex > 0) {
      this.captureAnswer(state);
    }

    const nextIndex = state.questionIndex + 1;
    const question = this.deps.questions.getQuestion(nextIndex);
    if (!question) {
      this.state = this.freshState(this.deps.questions.questionCount + 1, 0);
      this.reachedTerminal = true;
      this.record('ai', CLOSING_TEXT);
      log.info({ event: 'conversation_terminal', ...this.logContext }, 'interview complete');
      return { kind: 'end_call', text: CLOSING_TEXT };
    }

    this.state = this.freshState(nextIndex, question.maxFollowups);
    this.record('ai', question.text);
    log.info(
      { event: 'conversation_advanced', question_index: nextIndex, ...this.logContext },
      'conversation advanced',
    );

    const audio = this.deps.questions.getAudio(nextIndex);
    return {
      kind: 'ask_question',
      questionIndex: nextIndex,
      text: question.text,
      audio: audio.ready ? audio.audio : undefined,
    };
  }

  private captureAnswer(state: ConversationState): void {
    if (this.answers.some((entry) => entry.questionIndex === state.questionIndex)) {
      return;
    }
    this.answers.push({
      questionIndex: state.questionIndex,
      answer: state.lastAnswerText,
      responseType: state.responseType ?? 'default',
      extractedValues: { ...state.extractedValues },
      followups: state.followupHistory.map((exchange) => ({ ...exchange })),
    });
  }

  private freshState(questionIndex: number, maxFollowupAttempts: number): ConversationState {
    return {
      questionIndex,
      followupAttempts: 0,
      maxFollowupAttempts,
      followupHistory: [],
      lastAnswerText: '',
      responseType: undefined,
      extractedValues: {},
    };
  }

  private record(speaker: TranscriptEntry['speaker'], text: string): void {
    this.transcript.push({
      questionIndex: this.state?.questionIndex ?? 0,
      speaker,
      text,
      at: new Date(),
    });
  }
}
