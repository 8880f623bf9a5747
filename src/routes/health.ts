import { Router } from 'express';
import { log } from '../log';

interface CheckResult {
  ok: boolean;
  latency_ms?: number;
  error?: string;
}

interface HealthStatus {
  status: 'ok' | 'degraded' | 'unhealthy';
  checks: {
    redis?: CheckResult;
    question_audio: { ok: boolean; ready: number; total: number };
  };
  active_sessions: number;
  uptime_seconds: number;
}

export interface Pingable {
  ping(): Promise<string>;
}

export interface HealthDeps {
  sessions: { count(): number };
  questions: { readonly questionCount: number; readonly audioReadyCount: number };
  /** Null when no Redis is configured; the check is then skipped. */
  redis: () => Pingable | null;
}

const startTime = Date.now();

async function checkRedis(redis: Pingable): Promise<CheckResult> {
  const start = Date.now();
  try {
    await redis.ping();
    return { ok: true, latency_ms: Date.now() - start };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : 'unknown', latency_ms: Date.now() - start };
  }
}

export function createHealthRouter(deps: HealthDeps): Router {
  const router = Router();

  // Liveness: 200 while the process runs.
  router.get('/live', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  router.get('/', async (_req, res) => {
    const redisClient = deps.redis();
    const redis = redisClient ? await checkRedis(redisClient) : undefined;
    const total = deps.questions.questionCount;
    const ready = deps.questions.audioReadyCount;

    const questionAudio = { ok: ready === total, ready, total };
    const anyFailed = redis ? !redis.ok : false;
    const allOk = !anyFailed && questionAudio.ok;

    const checks: HealthStatus['checks'] = { question_audio: questionAudio };
    if (redis) checks.redis = redis;

    const status: HealthStatus = {
      status: anyFailed ? 'unhealthy' : allOk ? 'ok' : 'degraded',
      checks,
      active_sessions: deps.sessions.count(),
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
    };

    if (!allOk) {
      log.warn({ event: 'health_check_degraded', checks }, 'health check not fully ok');
    }

    res.status(anyFailed ? 503 : 200).json(status);
  });

  return router;
}
