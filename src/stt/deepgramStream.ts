import WebSocket from 'ws';
import { z } from 'zod';
import { env } from '../env';
import { log } from '../log';
import { incInboundAudioFramesDropped, incStageError, startStageTimer } from '../metrics';
import { withRetry } from '../retry';
import { EventQueue } from './eventQueue';
import type { RecognizerEvent, RecognizerFactory, RecognizerOptions, RecognizerStream } from './types';

const CLOSE_STREAM_MESSAGE = JSON.stringify({ type: 'CloseStream' });
const DEFAULT_CONNECT_TIMEOUT_MS = 5000;
const DEFAULT_CLOSE_TIMEOUT_MS = 1500;

const ResultsSchema = z.object({
  type: z.literal('Results').optional(),
  channel: z.object({
    alternatives: z
      .array(
        z.object({
          transcript: z.string().default(''),
          confidence: z.number().default(0),
        }),
      )
      .default([]),
  }),
  is_final: z.boolean().default(false),
  speech_final: z.boolean().default(false),
});

const ControlSchema = z.object({
  type: z.string(),
});

export interface DeepgramStreamConfig {
  url: string;
  apiKey: string;
  model: string;
  language: string;
  endpointingMs: number;
  connectTimeoutMs?: number;
  closeTimeoutMs?: number;
}

export function buildListenUrl(config: DeepgramStreamConfig, options: RecognizerOptions): string {
  const url = new URL(config.url);
  url.searchParams.set('encoding', options.encoding);
  url.searchParams.set('sample_rate', String(options.sampleRateHz));
  url.searchParams.set('channels', '1');
  url.searchParams.set('model', config.model);
  url.searchParams.set('language', config.language);
  url.searchParams.set('punctuate', 'true');
  url.searchParams.set('smart_format', 'true');
  url.searchParams.set('interim_results', 'true');
  url.searchParams.set('endpointing', String(config.endpointingMs));
  return url.toString();
}

/** Decodes one recognizer message; returns null for messages that carry no transcript event. */
export function parseRecognizerMessage(raw: string): RecognizerEvent | 'closed' | null {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return null;
  }

  const control = ControlSchema.safeParse(payload);
  if (control.success) {
    if (control.data.type === 'ClosedStream') {
      return 'closed';
    }
    if (control.data.type === 'UtteranceEnd') {
      return { transcript: '', confidence: 0, isFinal: true, speechFinal: true };
    }
    if (control.data.type !== 'Results') {
      return null;
    }
  }

  const results = ResultsSchema.safeParse(payload);
  if (!results.success) {
    return null;
  }

  const best = results.data.channel.alternatives[0];
  return {
    transcript: best?.transcript.trim() ?? '',
    confidence: best?.confidence ?? 0,
    isFinal: results.data.is_final,
    speechFinal: results.data.speech_final,
  };
}

function rawToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

export class DeepgramStream implements RecognizerStream {
  private readonly queue = new EventQueue<RecognizerEvent>();
  private readonly closeTimeoutMs: number;
  private closing?: Promise<void>;

  private constructor(
    private readonly socket: WebSocket,
    private readonly logContext: Record<string, unknown>,
    closeTimeoutMs: number,
  ) {
    this.closeTimeoutMs = closeTimeoutMs;

    socket.on('message', (data, isBinary) => {
      if (isBinary) {
        return;
      }
      const parsed = parseRecognizerMessage(rawToString(data));
      if (parsed === 'closed') {
        log.info({ event: 'stt_stream_closed_by_peer', ...this.logContext }, 'recognizer closed stream');
        this.queue.end();
        return;
      }
      if (parsed) {
        this.queue.push(parsed);
      }
    });

    socket.on('close', (code) => {
      log.info({ event: 'stt_socket_closed', code, ...this.logContext }, 'recognizer socket closed');
      this.queue.end();
    });

    socket.on('error', (error) => {
      incStageError('stt');
      log.warn({ event: 'stt_socket_error', err: error, ...this.logContext }, 'recognizer socket error');
      this.queue.end();
    });
  }

  public static open(config: DeepgramStreamConfig, options: RecognizerOptions): Promise<DeepgramStream> {
    const logContext = options.logContext ?? {};
    const url = buildListenUrl(config, options);
    const connectTimeoutMs = config.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    const socket = new WebSocket(url, { headers: { Authorization: `Token ${config.apiKey}` } });

    return new Promise<DeepgramStream>((resolve, reject) => {
      const timer = setTimeout(() => {
        socket.terminate();
        reject(new Error(`recognizer connect timeout after ${connectTimeoutMs}ms`));
      }, connectTimeoutMs);

      socket.once('open', () => {
        clearTimeout(timer);
        socket.removeAllListeners('error');
        resolve(new DeepgramStream(socket, logContext, config.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS));
      });

      socket.once('error', (error) => {
        clearTimeout(timer);
        reject(new Error(`recognizer connect failed: ${error.message}`));
      });
    });
  }

  public get closed(): boolean {
    return this.queue.isEnded || this.socket.readyState !== WebSocket.OPEN;
  }

  public send(audio: Buffer): void {
    if (this.socket.readyState !== WebSocket.OPEN) {
      incInboundAudioFramesDropped('recognizer_closed');
      return;
    }
    this.socket.send(audio);
  }

  public next(timeoutMs: number): Promise<RecognizerEvent | null> {
    return this.queue.next(timeoutMs);
  }

  public close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.closeSocket();
    }
    return this.closing;
  }

  private closeSocket(): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) {
      this.queue.end();
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.socket.terminate();
        this.queue.end();
        resolve();
      }, this.closeTimeoutMs);
      timer.unref?.();

      this.socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });

      if (this.socket.readyState === WebSocket.OPEN) {
        this.socket.send(CLOSE_STREAM_MESSAGE);
      }
    });
  }
}

export const createDeepgramRecognizer: RecognizerFactory = async (options) => {
  const endTimer = startStageTimer('stt_connect');
  try {
    return await withRetry(
      () =>
        DeepgramStream.open(
          {
            url: env.DEEPGRAM_URL,
            apiKey: env.DEEPGRAM_API_KEY,
            model: env.DEEPGRAM_MODEL,
            language: env.DEEPGRAM_LANGUAGE,
            endpointingMs: env.DEEPGRAM_ENDPOINTING_MS,
          },
          options,
        ),
      { label: 'stt_connect', retries: 2 },
    );
  } finally {
    endTimer();
  }
};
