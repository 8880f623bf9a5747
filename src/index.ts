import { HttpClassifier } from './ai/classifierClient';
import { sessionConfigFromEnv } from './calls/callSession';
import { SessionManager } from './calls/sessionManager';
import { env } from './env';
import { createCallRecordSink } from './history/callRecordSink';
import { LogOutcomePublisher, RedisOutcomePublisher, type OutcomePublisher } from './history/outcomePublisher';
import { TranscriptRecorder } from './history/transcriptStore';
import { log } from './log';
import { FillerStore } from './questions/fillerStore';
import { QuestionStore } from './questions/questionStore';
import { closeRedisClient, getRedisClient } from './redis/client';
import { buildServer } from './server';
import { createDeepgramRecognizer } from './stt/deepgramStream';
import { ElevenLabsTTS } from './tts/elevenLabsTTS';

const SHUTDOWN_GRACE_MS = 10_000;

async function main(): Promise<void> {
  const [questions, fillers] = await Promise.all([
    QuestionStore.load(env.QUESTIONS_PATH),
    FillerStore.load(env.FILLERS_PATH),
  ]);
  const synthesizer = new ElevenLabsTTS();

  if (env.QUESTION_AUDIO_PREGENERATE) {
    const generated = await questions.pregenerate(synthesizer);
    log.info(
      { event: 'question_audio_ready', generated, ready: questions.audioReadyCount, total: questions.questionCount },
      'question audio pregenerated',
    );
  }

  const redis = getRedisClient();
  const publisher: OutcomePublisher = redis
    ? new RedisOutcomePublisher(redis, env.OUTCOME_LIST_KEY)
    : new LogOutcomePublisher();

  const sessionManager = new SessionManager({
    services: {
      questions,
      fillers,
      classifier: new HttpClassifier(),
      synthesizer,
      openRecognizer: createDeepgramRecognizer,
      onRecord: createCallRecordSink(new TranscriptRecorder(env.TRANSCRIPT_DIR), publisher),
    },
    config: sessionConfigFromEnv(),
    idleTtlMinutes: env.IDLE_TTL_MINUTES,
  });

  const { server } = buildServer({ sessionManager, questions, redis: getRedisClient });

  server.listen(env.PORT, () => {
    log.info({ port: env.PORT, questions: questions.questionCount }, 'server listening');
  });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info({ event: 'shutdown', signal }, 'shutting down');

    const forceExit = setTimeout(() => process.exit(1), SHUTDOWN_GRACE_MS);
    forceExit.unref();

    server.close();
    sessionManager
      .shutdown(signal)
      .then(() => closeRedisClient())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error({ err: error, event: 'shutdown_failed' }, 'shutdown failed');
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  log.fatal({ err: error }, 'startup failed');
  process.exit(1);
});
