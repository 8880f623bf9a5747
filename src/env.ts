import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const stringToBoolean = (value: unknown): unknown => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === '') {
      return undefined;
    }
    if (normalized === 'true') {
      return true;
    }
    if (normalized === 'false') {
      return false;
    }
  }
  return value;
};

const positiveInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));

const ratio = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().min(0).max(1).default(fallback));

const optionalString = () => z.preprocess(emptyToUndefined, z.string().min(1).optional());

const stringWithDefault = (fallback: string) =>
  z.preprocess(emptyToUndefined, z.string().min(1).default(fallback));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive(),
  LOG_LEVEL: stringWithDefault('info'),
  PUBLIC_BASE_URL: z.string().min(1),
  MEDIA_STREAM_TOKEN: z.string().min(1),

  DEEPGRAM_API_KEY: z.string().min(1),
  DEEPGRAM_URL: stringWithDefault('wss://api.deepgram.com/v1/listen'),
  DEEPGRAM_MODEL: stringWithDefault('nova-2-phonecall'),
  DEEPGRAM_LANGUAGE: stringWithDefault('en-US'),
  DEEPGRAM_ENDPOINTING_MS: positiveInt(300),

  ELEVENLABS_API_KEY: z.string().min(1),
  ELEVENLABS_VOICE_ID: z.string().min(1),
  ELEVENLABS_URL: stringWithDefault('https://api.elevenlabs.io/v1'),
  ELEVENLABS_MODEL_ID: stringWithDefault('eleven_turbo_v2_5'),
  ELEVENLABS_OPTIMIZE_LATENCY: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().min(0).max(4).default(4),
  ),

  CLASSIFIER_URL: optionalString(),
  CLASSIFIER_API_KEY: optionalString(),
  CLASSIFIER_TIMEOUT_MS: positiveInt(8000),

  QUESTIONS_PATH: stringWithDefault('config/questions.json'),
  FILLERS_PATH: stringWithDefault('config/fillers.json'),
  QUESTION_AUDIO_PREGENERATE: z.preprocess(stringToBoolean, z.boolean().default(true)),

  STT_FLUSH_FRAMES: positiveInt(10),
  HEARTBEAT_MS: positiveInt(10_000),
  RECOGNIZER_POLL_MS: positiveInt(100),

  ENDPOINT_FALLBACK_MS: positiveInt(300),
  ENDPOINT_REPROMPT_MS: positiveInt(5000),
  ENDPOINT_CONFIDENCE: ratio(0.88),
  ENDPOINT_FALLBACK_CONFIDENCE: ratio(0.8),

  REPLAY_MAX_ATTEMPTS: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).default(3)),
  REPLAY_MIN_BYTES: positiveInt(1000),

  PLAYBACK_ACK_TIMEOUT_MS: positiveInt(30_000),
  START_TIMEOUT_MS: positiveInt(30_000),
  IDLE_TTL_MINUTES: positiveInt(10),

  TRANSCRIPT_DIR: stringWithDefault('transcripts'),
  REDIS_URL: optionalString(),
  OUTCOME_LIST_KEY: stringWithDefault('screening:outcomes'),
});

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join(', ');
  throw new Error(`Invalid environment variables: ${issues}`);
}

export const env = parsed.data;
export type Env = typeof env;
