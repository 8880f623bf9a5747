import os from 'node:os';
import path from 'node:path';

const defaults: Record<string, string> = {
  PORT: '3000',
  LOG_LEVEL: 'silent',
  PUBLIC_BASE_URL: 'https://screening.example.test',
  MEDIA_STREAM_TOKEN: 'test-secret',
  DEEPGRAM_API_KEY: 'test-secret',
  DEEPGRAM_URL: 'ws://127.0.0.1:1/v1/listen',
  ELEVENLABS_API_KEY: 'test-secret',
  ELEVENLABS_VOICE_ID: 'test-voice',
  ELEVENLABS_URL: 'http://127.0.0.1:1/v1',
  QUESTION_AUDIO_PREGENERATE: 'false',
  TRANSCRIPT_DIR: path.join(os.tmpdir(), 'screening-transcripts-test'),
};

export function setTestEnv(): void {
  for (const [key, value] of Object.entries(defaults)) {
    if (!process.env[key]) {
      process.env[key] = value;
    }
  }
}
