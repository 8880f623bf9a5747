import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';
import { log } from './log';

/**
 * Runtime Prometheus metrics
 *
 * prom-client Histogram.startTimer() measures seconds; this module records
 * milliseconds to match the *_ms metric names.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'voice_screening_runtime_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000],
  registers: [register],
});

// Pipeline stage duration (stt_connect, classify, tts_first_chunk, ...)
const stageDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}stage_duration_ms`,
  help: 'Stage duration in milliseconds',
  labelNames: ['stage'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000],
  registers: [register],
});

const stageErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}stage_errors_total`,
  help: 'Count of errors by stage',
  labelNames: ['stage'] as const,
  registers: [register],
});

const inboundAudioFramesTotal = new client.Counter({
  name: `${METRICS_PREFIX}inbound_audio_frames_total`,
  help: 'Inbound media frames received from the transport',
  registers: [register],
});

const sttFramesFlushedTotal = new client.Counter({
  name: `${METRICS_PREFIX}stt_frames_flushed_total`,
  help: 'Inbound media frames flushed to the recognizer',
  registers: [register],
});

const inboundAudioFramesDroppedTotal = new client.Counter({
  name: `${METRICS_PREFIX}inbound_audio_frames_dropped_total`,
  help: 'Inbound media frames dropped before the recognizer',
  labelNames: ['reason'] as const,
  registers: [register],
});

const bargeInsTotal = new client.Counter({
  name: `${METRICS_PREFIX}barge_ins_total`,
  help: 'Caller speech detected while the assistant was speaking',
  registers: [register],
});

const replaysTotal = new client.Counter({
  name: `${METRICS_PREFIX}replays_total`,
  help: 'Replay decisions after a barge-in',
  labelNames: ['outcome'] as const,
  registers: [register],
});

const repromptsTotal = new client.Counter({
  name: `${METRICS_PREFIX}reprompts_total`,
  help: 'Re-prompts played after a long silence',
  registers: [register],
});

const callCompletionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}call_completions_total`,
  help: 'Calls completed (teardown)',
  labelNames: ['reason'] as const,
  registers: [register],
});

const callDurationSeconds = new client.Histogram({
  name: `${METRICS_PREFIX}call_duration_seconds`,
  help: 'Call duration in seconds',
  buckets: [5, 10, 30, 60, 120, 300, 600],
  registers: [register],
});

const callTurns = new client.Histogram({
  name: `${METRICS_PREFIX}call_turns`,
  help: 'Caller turns per call',
  buckets: [0, 1, 2, 3, 5, 10, 20],
  registers: [register],
});

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

function readString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const route: unknown = req.route;
  const routePath =
    typeof route === 'object' && route !== null && 'path' in route ? readString(route.path) : undefined;

  if (routePath) return req.baseUrl ? `${req.baseUrl}${routePath}` : routePath;

  const raw = req.path || req.url || 'unknown';
  return raw
    .replace(/\bCA[0-9a-f]{32}\b/gi, ':callSid')
    .replace(/\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, ':uuid')
    .replace(/\b\d{6,}\b/g, ':n');
}

function safely(label: string, fn: () => void): void {
  try {
    fn();
  } catch (error) {
    log.debug({ err: error, event: 'metric_record_failed', metric: label }, 'metric record failed');
  }
}

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    safely('http_request_duration_ms', () => {
      httpRequestDurationMs.observe(
        {
          method: req.method,
          route: getRouteLabel(req),
          code: String(res.statusCode),
        },
        nsToMs(nowNs() - start),
      );
    });
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

/**
 * Starts a stage timer and returns an end() function that records
 * milliseconds and returns them.
 */
export function startStageTimer(stage: string): () => number {
  const start = nowNs();

  return () => {
    const durationMs = nsToMs(nowNs() - start);
    safely('stage_duration_ms', () => stageDurationMs.observe({ stage }, durationMs));
    return durationMs;
  };
}

export function incStageError(stage: string): void {
  safely('stage_errors_total', () => stageErrorsTotal.inc({ stage }));
}

export function incInboundAudioFrames(count = 1): void {
  safely('inbound_audio_frames_total', () => inboundAudioFramesTotal.inc(count));
}

export function incSttFramesFlushed(count = 1): void {
  safely('stt_frames_flushed_total', () => sttFramesFlushedTotal.inc(count));
}

export function incInboundAudioFramesDropped(reason: string, count = 1): void {
  const label = reason && reason.trim() !== '' ? reason : 'unknown';
  safely('inbound_audio_frames_dropped_total', () =>
    inboundAudioFramesDroppedTotal.inc({ reason: label }, count),
  );
}

export function incBargeIn(): void {
  safely('barge_ins_total', () => bargeInsTotal.inc());
}

export function incReplay(outcome: 'replayed' | 'exhausted' | 'rejected'): void {
  safely('replays_total', () => replaysTotal.inc({ outcome }));
}

export function incReprompt(): void {
  safely('reprompts_total', () => repromptsTotal.inc());
}

export function recordCallMetrics(opts: { reason?: string; durationMs: number; turns: number }): void {
  safely('call_completion', () => {
    callCompletionsTotal.inc({ reason: opts.reason ?? 'unknown' });
    callDurationSeconds.observe(opts.durationMs / 1000);
    callTurns.observe(opts.turns);
  });
}
