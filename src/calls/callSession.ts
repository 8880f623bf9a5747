import { randomUUID } from 'crypto';
import { chunkAudio, collectSpeech, decodeChunks } from '../audio/playback';
import type { ResponseClassifier } from '../ai/types';
import { env } from '../env';
import { log } from '../log';
import {
  incBargeIn,
  incInboundAudioFrames,
  incInboundAudioFramesDropped,
  incReplay,
  incReprompt,
  incStageError,
  incSttFramesFlushed,
  recordCallMetrics,
  startStageTimer,
} from '../metrics';
import { REPROMPT_TEXT } from '../questions/phrases';
import type { FillerSource, QuestionSource } from '../questions/types';
import type { RecognizerEvent, RecognizerFactory, RecognizerStream } from '../stt/types';
import { END_CALL_MARK, markFrame, mediaFrame, parseInboundEvent } from '../transport/twilioMediaStream';
import type { InboundMediaEvent, MediaSocket, StreamStart } from '../transport/types';
import type { SpeechSynthesizer } from '../tts/types';
import { ConversationFlow, type ConversationSummary, type FlowCommand } from './conversationFlow';
import { DEFAULT_ENDPOINT_CONFIG, EndpointDetector, type EndpointConfig } from './endpointDetector';
import type { CallPhase, CallRecord, CallRecordSink, CallSessionId, CallSessionMetrics } from './types';

const SAMPLE_RATE_HZ = 8000;

export interface CallSessionConfig {
  /** Inbound media frames batched per recognizer write. */
  flushFrames: number;
  heartbeatMs: number;
  pollMs: number;
  replayMaxAttempts: number;
  replayMinBytes: number;
  playbackAckTimeoutMs: number;
  startTimeoutMs: number;
  endpoint: EndpointConfig;
}

export function sessionConfigFromEnv(): CallSessionConfig {
  return {
    flushFrames: env.STT_FLUSH_FRAMES,
    heartbeatMs: env.HEARTBEAT_MS,
    pollMs: env.RECOGNIZER_POLL_MS,
    replayMaxAttempts: env.REPLAY_MAX_ATTEMPTS,
    replayMinBytes: env.REPLAY_MIN_BYTES,
    playbackAckTimeoutMs: env.PLAYBACK_ACK_TIMEOUT_MS,
    startTimeoutMs: env.START_TIMEOUT_MS,
    endpoint: {
      ...DEFAULT_ENDPOINT_CONFIG,
      fallbackMs: env.ENDPOINT_FALLBACK_MS,
      repromptMs: env.ENDPOINT_REPROMPT_MS,
      confidenceThreshold: env.ENDPOINT_CONFIDENCE,
      fallbackConfidenceThreshold: env.ENDPOINT_FALLBACK_CONFIDENCE,
    },
  };
}

/** Collaborators shared by every call. */
export interface CallServices {
  questions: QuestionSource;
  fillers: FillerSource;
  classifier: ResponseClassifier;
  synthesizer: SpeechSynthesizer;
  openRecognizer: RecognizerFactory;
  onRecord: CallRecordSink;
}

export interface CallSessionDeps extends CallServices {
  sessionId: CallSessionId;
  socket: MediaSocket;
  config: CallSessionConfig;
  requestId?: string;
  onClosed?: (session: CallSession) => void;
  now?: () => number;
}

interface PlaybackItem {
  text: string;
  /** Ready audio; otherwise the text is synthesized while it plays. */
  audio?: Buffer;
  /** Spoken first, while `text` is synthesized in the background. */
  filler?: string;
  /** Question whose audio should be kept once synthesized. */
  cacheQuestionIndex?: number;
  endCall?: boolean;
}

interface ReplayState {
  audio?: Buffer;
  text?: string;
  attempts: number;
}

/**
 * One phone call: media in, recognizer, endpointing, the question flow, and
 * speech out. Everything mutable here belongs to this call alone.
 */
export class CallSession {
  public readonly sessionId: CallSessionId;
  public callSid?: string;
  public streamSid?: string;
  public phoneNumber?: string;

  private phaseValue: CallPhase = 'CONNECTED';
  private phaseChangedAt: number;
  private readonly config: CallSessionConfig;
  private readonly deps: CallSessionDeps;
  private readonly now: () => number;
  private readonly logContext: Record<string, unknown>;
  private readonly detector: EndpointDetector;
  private readonly metrics: CallSessionMetrics;
  private readonly abortController = new AbortController();

  private inboundFrames: Buffer[] = [];
  private outstandingMarks: string[] = [];
  private replay: ReplayState = { attempts: 0 };
  private recognizer?: RecognizerStream;
  private flow?: ConversationFlow;
  private heartbeatTimer?: NodeJS.Timeout;
  private playbackChain: Promise<void> = Promise.resolve();
  private playbackDepth = 0;
  private turnChain: Promise<void> = Promise.resolve();
  private turnInFlight = false;
  private streamStarted = false;
  private endReason?: string;
  private teardownPromise?: Promise<void>;

  constructor(deps: CallSessionDeps) {
    this.deps = deps;
    this.sessionId = deps.sessionId;
    this.config = deps.config;
    this.now = deps.now ?? Date.now;
    this.phaseChangedAt = this.now();
    this.detector = new EndpointDetector(this.config.endpoint, this.now());

    const createdAt = new Date(this.now());
    this.metrics = { createdAt, lastActivityAt: createdAt, turns: 0, callerSpoke: false };

    this.logContext = { session_id: this.sessionId, requestId: deps.requestId };
  }

  public get phase(): CallPhase {
    return this.phaseValue;
  }

  public get speaking(): boolean {
    return this.phaseValue === 'SPEAKING';
  }

  public get listening(): boolean {
    return this.phaseValue === 'LISTENING';
  }

  public get exiting(): boolean {
    return this.phaseValue === 'TEARING_DOWN';
  }

  public get pendingMarks(): readonly string[] {
    return this.outstandingMarks;
  }

  public get replayAttempts(): number {
    return this.replay.attempts;
  }

  public get utteranceText(): string {
    return this.detector.text;
  }

  public get conversation(): ConversationFlow | undefined {
    return this.flow;
  }

  public getLastActivityAt(): Date {
    return this.metrics.lastActivityAt;
  }

  /** Opens the recognizer and starts the heartbeat and recognizer loop. */
  public async connect(): Promise<void> {
    this.heartbeatTimer = setInterval(() => this.heartbeat(), this.config.heartbeatMs);
    this.heartbeatTimer.unref?.();

    let recognizer: RecognizerStream;
    try {
      recognizer = await this.deps.openRecognizer({
        encoding: 'mulaw',
        sampleRateHz: SAMPLE_RATE_HZ,
        logContext: this.logContext,
      });
    } catch (error) {
      incStageError('stt');
      log.error(
        { err: error, event: 'stt_open_failed', ...this.logContext },
        'recognizer unavailable, continuing without transcription',
      );
      return;
    }

    if (this.exiting) {
      await this.closeRecognizer(recognizer);
      return;
    }

    this.recognizer = recognizer;
    log.info({ event: 'stt_stream_open', ...this.logContext }, 'recognizer stream open');
    await this.runRecognizerLoop(recognizer);
  }

  /** Entry point for every text frame from the media socket. */
  public handleMessage(raw: string): void {
    if (this.exiting) {
      return;
    }

    let event: InboundMediaEvent;
    try {
      event = parseInboundEvent(raw);
    } catch (error) {
      log.warn({ err: error, event: 'media_event_invalid', ...this.logContext }, 'invalid media stream event');
      return;
    }

    this.metrics.lastActivityAt = new Date(this.now());

    try {
      this.dispatch(event);
    } catch (error) {
      log.error({ err: error, event: 'media_event_failed', kind: event.kind, ...this.logContext }, 'media event failed');
      void this.teardown('event_failure');
    }
  }

  public onTransportClosed(reason = 'transport_closed'): Promise<void> {
    return this.teardown(reason);
  }

  public teardown(reason: string): Promise<void> {
    if (!this.teardownPromise) {
      this.teardownPromise = this.runTeardown(reason);
    }
    return this.teardownPromise;
  }

  private dispatch(event: InboundMediaEvent): void {
    switch (event.kind) {
      case 'connected':
        log.info({ event: 'media_connected', protocol: event.protocol, ...this.logContext }, 'media stream connected');
        return;
      case 'start':
        this.onStart(event.start);
        return;
      case 'media':
        this.onMedia(event.payload);
        return;
      case 'mark':
        this.onMark(event.name);
        return;
      case 'stop':
        void this.teardown('stop');
        return;
      case 'closed':
        void this.teardown('closed');
        return;
      case 'unknown':
        log.warn({ event: 'media_event_unknown', type: event.event, ...this.logContext }, 'unknown media event ignored');
        return;
    }
  }

  private onStart(start: StreamStart): void {
    if (this.streamStarted) {
      log.warn({ event: 'media_start_duplicate', ...this.logContext }, 'duplicate stream start ignored');
      return;
    }

    this.streamStarted = true;
    this.streamSid = start.streamSid;
    this.callSid = start.customParameters.callSid ?? start.callSid;
    this.phoneNumber = start.customParameters.phoneNumber;
    this.metrics.startedAt = new Date(this.now());
    this.logContext.call_sid = this.callSid;
    this.logContext.stream_sid = this.streamSid;

    log.info(
      { event: 'call_stream_start', media_format: start.mediaFormat, ...this.logContext },
      'call stream started',
    );

    this.flow = new ConversationFlow(this.callSid, {
      questions: this.deps.questions,
      classifier: this.deps.classifier,
      logContext: this.logContext,
    });
    const greeting = this.flow.begin();
    this.enqueuePlayback({ text: greeting });
  }

  private onMedia(payload: Buffer): void {
    incInboundAudioFrames();
    this.inboundFrames.push(payload);
    if (this.inboundFrames.length < this.config.flushFrames) {
      return;
    }

    const frames = this.inboundFrames.length;
    const audio = Buffer.concat(this.inboundFrames);
    this.inboundFrames = [];

    if (!this.recognizer || this.recognizer.closed) {
      incInboundAudioFramesDropped('recognizer_unavailable', frames);
      return;
    }
    this.recognizer.send(audio);
    incSttFramesFlushed(frames);
  }

  private onMark(name: string): void {
    const index = this.outstandingMarks.indexOf(name);
    if (index === -1) {
      log.debug({ event: 'mark_unknown', mark: name, ...this.logContext }, 'unknown mark ignored');
      return;
    }
    this.outstandingMarks.splice(index, 1);

    if (name === END_CALL_MARK) {
      log.info({ event: 'end_call_mark', ...this.logContext }, 'closing message played');
      void this.teardown('end_call');
      return;
    }

    if (this.outstandingMarks.length === 0 && this.playbackDepth === 0 && this.speaking) {
      this.enterListening();
    }
  }

  private enterSpeaking(): boolean {
    if (this.exiting) {
      return false;
    }
    if (this.phaseValue !== 'SPEAKING') {
      this.phaseValue = 'SPEAKING';
      this.phaseChangedAt = this.now();
    }
    return true;
  }

  private enterListening(): void {
    if (this.exiting) {
      return;
    }
    this.phaseValue = 'LISTENING';
    this.phaseChangedAt = this.now();
    this.detector.reset(this.now());
  }

  private async runRecognizerLoop(recognizer: RecognizerStream): Promise<void> {
    while (!this.exiting) {
      let event: RecognizerEvent | null;
      try {
        event = await recognizer.next(this.config.pollMs);
      } catch (error) {
        incStageError('stt');
        log.error({ err: error, event: 'stt_read_failed', ...this.logContext }, 'recognizer read failed');
        return;
      }

      if (this.exiting) {
        return;
      }

      const now = this.now();
      if (event) {
        this.onRecognizerEvent(event, now);
      } else if (recognizer.closed) {
        log.warn({ event: 'stt_stream_lost', ...this.logContext }, 'recognizer stream closed mid-call');
        return;
      }

      this.onEndpointTick(now);
    }
  }

  private onRecognizerEvent(event: RecognizerEvent, now: number): void {
    const transcript = event.transcript.trim();

    if (this.speaking) {
      if (transcript !== '') {
        this.handleBargeIn(transcript, now);
      }
      return;
    }

    if (!this.listening || this.turnInFlight) {
      return;
    }

    if (transcript !== '') {
      this.metrics.callerSpoke = true;
    }
    this.detector.onEvent(event, now);
  }

  private onEndpointTick(now: number): void {
    const busy = !this.listening || this.turnInFlight;
    const action = this.detector.tick(now, busy);
    if (!action) {
      return;
    }

    if (action.kind === 'reprompt') {
      this.reprompt();
      return;
    }

    this.dispatchTurn(action.text);
  }

  private handleBargeIn(transcript: string, now: number): void {
    incBargeIn();
    this.detector.reset(now);
    log.info(
      { event: 'barge_in', transcript_length: transcript.length, replay_attempts: this.replay.attempts, ...this.logContext },
      'barge in',
    );

    const audio = this.replay.audio;
    if (!audio || audio.length < this.config.replayMinBytes) {
      incReplay('rejected');
      log.info(
        { event: 'replay_rejected', audio_bytes: audio?.length ?? 0, ...this.logContext },
        'nothing to replay',
      );
      return;
    }

    if (this.replay.attempts >= this.config.replayMaxAttempts) {
      incReplay('exhausted');
      log.warn(
        { event: 'replay_exhausted', replay_attempts: this.replay.attempts, ...this.logContext },
        'replay limit reached',
      );
      return;
    }

    this.replay.attempts += 1;
    incReplay('replayed');
    log.info(
      { event: 'replay', attempt: this.replay.attempts, text: this.replay.text, ...this.logContext },
      'replaying last utterance',
    );

    try {
      this.sendAudio(audio);
      this.sendMark(randomUUID());
    } catch (error) {
      log.warn({ err: error, event: 'replay_failed', ...this.logContext }, 'replay failed');
    }
  }

  private reprompt(): void {
    if (!this.flow) {
      return;
    }
    incReprompt();
    log.info({ event: 'call_session_reprompt', ...this.logContext }, 'long silence reprompt');
    this.flow.recordPrompt(REPROMPT_TEXT);
    this.enqueuePlayback({ text: REPROMPT_TEXT });
  }

  private dispatchTurn(text: string): void {
    const flow = this.flow;
    if (!flow) {
      log.warn({ event: 'conversation_state_missing', ...this.logContext }, 'utterance before stream start');
      return;
    }

    this.turnInFlight = true;
    this.metrics.turns += 1;
    log.info(
      { event: 'utterance_finalized', transcript_length: text.length, ...this.logContext },
      'utterance finalized',
    );

    this.turnChain = this.turnChain
      .then(() => this.runTurn(flow, text))
      .catch((error: unknown) => {
        log.error({ err: error, event: 'turn_failed', ...this.logContext }, 'turn handling failed');
      })
      .finally(() => {
        this.turnInFlight = false;
      });
  }

  private async runTurn(flow: ConversationFlow, text: string): Promise<void> {
    const endTimer = startStageTimer('turn_latency');
    let command: FlowCommand;
    try {
      command = await flow.handleUtterance(text);
    } finally {
      endTimer();
    }

    if (this.exiting) {
      return;
    }
    this.execute(command);
  }

  private execute(command: FlowCommand): void {
    switch (command.kind) {
      case 'ask_question':
        this.enqueuePlayback({
          text: command.text,
          audio: command.audio,
          cacheQuestionIndex: command.audio ? undefined : command.questionIndex,
        });
        return;
      case 'ask_followup':
        this.enqueuePlayback({
          text: command.text,
          filler: command.firstFollowup ? this.deps.fillers.getFiller(command.questionIndex) : undefined,
        });
        return;
      case 'end_call':
        this.enqueuePlayback({ text: command.text, endCall: true });
        return;
      case 'none':
        return;
    }
  }

  private enqueuePlayback(item: PlaybackItem): void {
    if (!this.enterSpeaking()) {
      return;
    }
    this.playbackDepth += 1;
    this.playbackChain = this.playbackChain
      .then(() => this.play(item))
      .catch((error: unknown) => {
        log.error({ err: error, event: 'playback_failed', ...this.logContext }, 'playback failed');
      })
      .finally(() => {
        this.playbackDepth -= 1;
        this.settleAfterPlayback();
      });
  }

  private async play(item: PlaybackItem): Promise<void> {
    if (this.exiting) {
      return;
    }

    // New audio: the previous utterance is no longer a replay candidate.
    this.replay = { attempts: 0 };

    try {
      let audio: Buffer;
      if (item.audio) {
        audio = item.audio;
        this.sendAudio(audio);
      } else if (item.filler) {
        audio = await this.playWithFiller(item.filler, item.text);
      } else {
        audio = await this.streamText(item.text);
      }

      if (this.exiting) {
        return;
      }

      if (item.cacheQuestionIndex !== undefined) {
        this.deps.questions.storeAudio(item.cacheQuestionIndex, audio);
      }
      this.replay = { audio, text: item.text, attempts: 0 };
      this.sendMark(item.endCall ? END_CALL_MARK : randomUUID());
    } catch (error) {
      incStageError('tts');
      log.error(
        { err: error, event: 'speech_playback_failed', end_call: Boolean(item.endCall), ...this.logContext },
        'speech playback failed',
      );
      if (item.endCall) {
        await this.teardown('end_call_playback_failed');
      }
    }
  }

  private async playWithFiller(filler: string, text: string): Promise<Buffer> {
    const pending = collectSpeech(this.deps.synthesizer, text, this.abortController.signal);

    try {
      await this.streamText(filler);
      this.sendMark(randomUUID());
    } catch (error) {
      log.warn({ err: error, event: 'filler_failed', ...this.logContext }, 'filler playback failed');
    }

    const result = await pending;
    if (!result.ok) {
      throw result.error;
    }
    const audio = decodeChunks(result.chunks);
    this.sendAudio(audio);
    return audio;
  }

  private async streamText(text: string): Promise<Buffer> {
    const endFirstChunk = startStageTimer('tts_first_chunk');
    const endTotal = startStageTimer('tts_total');
    const parts: Buffer[] = [];

    for await (const chunk of this.deps.synthesizer.stream({ text }, this.abortController.signal)) {
      if (this.exiting) {
        break;
      }
      if (parts.length === 0) {
        endFirstChunk();
      }
      this.sendMedia(chunk);
      parts.push(Buffer.from(chunk, 'base64'));
    }

    endTotal();
    return Buffer.concat(parts);
  }

  // Playback that produced no mark would leave the call speaking forever.
  private settleAfterPlayback(): void {
    if (this.playbackDepth === 0 && this.outstandingMarks.length === 0 && this.speaking) {
      this.enterListening();
    }
  }

  private sendAudio(audio: Buffer): void {
    for (const chunk of chunkAudio(audio)) {
      this.sendMedia(chunk);
    }
  }

  private sendMedia(payload: string): void {
    if (!this.streamSid || !this.deps.socket.isOpen) {
      throw new Error('media socket not writable');
    }
    this.deps.socket.send(mediaFrame(this.streamSid, payload));
  }

  private sendMark(name: string): void {
    if (!this.streamSid || !this.deps.socket.isOpen) {
      throw new Error('media socket not writable');
    }
    this.outstandingMarks.push(name);
    this.deps.socket.send(markFrame(this.streamSid, name));
  }

  private heartbeat(): void {
    if (this.exiting) {
      return;
    }

    const inPhaseMs = this.now() - this.phaseChangedAt;
    log.debug(
      {
        event: 'call_heartbeat',
        phase: this.phaseValue,
        in_phase_ms: inPhaseMs,
        outstanding_marks: this.outstandingMarks.length,
        ...this.logContext,
      },
      'call heartbeat',
    );

    if (this.phaseValue === 'CONNECTED' && inPhaseMs >= this.config.startTimeoutMs) {
      log.warn({ event: 'call_start_timeout', ...this.logContext }, 'stream never started');
      void this.teardown('start_timeout');
      return;
    }

    if (this.speaking && this.playbackDepth === 0 && inPhaseMs >= this.config.playbackAckTimeoutMs) {
      log.warn(
        { event: 'playback_ack_timeout', outstanding_marks: this.outstandingMarks.length, ...this.logContext },
        'playback never acknowledged, listening',
      );
      const endCallPending = this.outstandingMarks.includes(END_CALL_MARK);
      this.outstandingMarks = [];
      if (endCallPending) {
        void this.teardown('end_call_ack_timeout');
        return;
      }
      this.enterListening();
    }
  }

  private async closeRecognizer(recognizer: RecognizerStream): Promise<void> {
    try {
      await recognizer.close();
    } catch (error) {
      log.warn({ err: error, event: 'stt_close_failed', ...this.logContext }, 'recognizer close failed');
    }
  }

  private async runTeardown(reason: string): Promise<void> {
    this.endReason = reason;
    this.phaseValue = 'TEARING_DOWN';
    this.phaseChangedAt = this.now();
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = undefined;
    }
    this.abortController.abort();

    if (this.recognizer) {
      const recognizer = this.recognizer;
      this.recognizer = undefined;
      await this.closeRecognizer(recognizer);
    }

    const summary = this.flow?.end();
    const record = this.buildRecord(reason, summary);
    void this.deps.onRecord(record).catch((error: unknown) => {
      log.error({ err: error, event: 'call_record_failed', ...this.logContext }, 'call record hand-off failed');
    });

    this.inboundFrames = [];
    this.outstandingMarks = [];
    this.replay = { attempts: 0 };

    if (this.deps.socket.isOpen) {
      this.deps.socket.close(1000, reason);
    }

    const durationMs = this.now() - this.metrics.createdAt.getTime();
    recordCallMetrics({ reason, durationMs, turns: this.metrics.turns });
    log.info(
      {
        event: 'call_session_teardown',
        reason,
        turns: this.metrics.turns,
        question_index: summary?.questionIndex,
        completed: summary?.reachedTerminal ?? false,
        session_duration_ms: durationMs,
        ...this.logContext,
      },
      'call session teardown',
    );

    this.deps.onClosed?.(this);
  }

  private buildRecord(reason: string, summary: ConversationSummary | undefined): CallRecord {
    return {
      sessionId: this.sessionId,
      callSid: this.callSid,
      streamSid: this.streamSid,
      phoneNumber: this.phoneNumber,
      questionCount: this.deps.questions.questionCount,
      questionIndex: summary?.questionIndex ?? 0,
      reachedTerminal: summary?.reachedTerminal ?? false,
      callerSpoke: this.metrics.callerSpoke,
      streamStarted: this.streamStarted,
      endReason: this.endReason ?? reason,
      startedAt: this.metrics.startedAt ?? this.metrics.createdAt,
      endedAt: new Date(this.now()),
      answers: summary?.answers ?? [],
      transcript: summary?.transcript ?? [],
    };
  }
}
