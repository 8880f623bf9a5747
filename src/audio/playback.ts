import type { SpeechSynthesizer } from '../tts/types';

/** 20 ms of 8 kHz mu-law per frame, sent in 400 ms slices. */
export const OUTBOUND_CHUNK_BYTES = 160 * 20;

export function chunkAudio(audio: Buffer, chunkBytes = OUTBOUND_CHUNK_BYTES): string[] {
  const chunks: string[] = [];
  for (let offset = 0; offset < audio.length; offset += chunkBytes) {
    chunks.push(audio.subarray(offset, offset + chunkBytes).toString('base64'));
  }
  return chunks;
}

export function decodeChunks(chunks: string[]): Buffer {
  return Buffer.concat(chunks.map((chunk) => Buffer.from(chunk, 'base64')));
}

export type CollectedSpeech = { ok: true; chunks: string[] } | { ok: false; error: unknown };

/**
 * Synthesizes `text` in the background while something else is playing.
 * Never rejects; failures come back as `{ ok: false }`.
 */
export async function collectSpeech(
  synthesizer: SpeechSynthesizer,
  text: string,
  signal?: AbortSignal,
): Promise<CollectedSpeech> {
  const chunks: string[] = [];
  try {
    for await (const chunk of synthesizer.stream({ text }, signal)) {
      chunks.push(chunk);
    }
    return { ok: true, chunks };
  } catch (error) {
    return { ok: false, error };
  }
}
