export interface TTSRequest {
  text: string;
  voice?: string;
}

export interface SpeechSynthesizer {
  /** Batch mode: the whole utterance as one mu-law buffer. */
  synthesize(request: TTSRequest): Promise<Buffer>;
  /** Streaming mode: base64 mu-law chunks in playback order. */
  stream(request: TTSRequest, signal?: AbortSignal): AsyncIterable<string>;
}
