import { env } from '../env';
import { log } from '../log';
import { incStageError } from '../metrics';
import type { SpeechSynthesizer, TTSRequest } from './types';

const OUTPUT_FORMAT = 'ulaw_8000';

const VOICE_SETTINGS = {
  stability: 0.6,
  similarity_boost: 1.0,
  style: 0.1,
  use_speaker_boost: true,
} as const;

export interface ElevenLabsOptions {
  baseUrl?: string;
  apiKey?: string;
  voiceId?: string;
  modelId?: string;
  optimizeLatency?: number;
}

export class ElevenLabsTTS implements SpeechSynthesizer {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly voiceId: string;
  private readonly modelId: string;
  private readonly optimizeLatency: number;

  constructor(options: ElevenLabsOptions = {}) {
    this.baseUrl = (options.baseUrl ?? env.ELEVENLABS_URL).replace(/\/$/, '');
    this.apiKey = options.apiKey ?? env.ELEVENLABS_API_KEY;
    this.voiceId = options.voiceId ?? env.ELEVENLABS_VOICE_ID;
    this.modelId = options.modelId ?? env.ELEVENLABS_MODEL_ID;
    this.optimizeLatency = options.optimizeLatency ?? env.ELEVENLABS_OPTIMIZE_LATENCY;
  }

  public async synthesize(request: TTSRequest): Promise<Buffer> {
    const response = await this.request(request, false);
    const arrayBuffer = await response.arrayBuffer();
    return Buffer.from(arrayBuffer);
  }

  public async *stream(request: TTSRequest, signal?: AbortSignal): AsyncIterable<string> {
    const response = await this.request(request, true, signal);
    if (!response.body) {
      throw new Error('elevenlabs stream missing body');
    }

    const reader = response.body.getReader();
    try {
      while (true) {
        const { value, done } = await reader.read();
        if (done) {
          break;
        }
        const bytes: Uint8Array = value;
        if (bytes.byteLength > 0) {
          yield Buffer.from(bytes).toString('base64');
        }
      }
    } finally {
      reader.releaseLock();
    }
  }

  private async request(request: TTSRequest, streaming: boolean, signal?: AbortSignal): Promise<Response> {
    const voice = request.voice ?? this.voiceId;
    const path = streaming ? `text-to-speech/${voice}/stream` : `text-to-speech/${voice}`;
    const url = new URL(`${this.baseUrl}/${path}`);
    url.searchParams.set('output_format', OUTPUT_FORMAT);
    url.searchParams.set('optimize_streaming_latency', String(this.optimizeLatency));

    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'audio/basic',
        'xi-api-key': this.apiKey,
      },
      body: JSON.stringify({
        text: request.text,
        model_id: this.modelId,
        voice_settings: VOICE_SETTINGS,
      }),
      signal,
    });

    if (!response.ok) {
      const body = await response.text();
      incStageError('tts');
      log.error({ status: response.status, body }, 'elevenlabs tts error');
      throw new Error(`elevenlabs tts error ${response.status}`);
    }

    return response;
  }
}
