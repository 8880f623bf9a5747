import { env } from '../env';
import { log } from '../log';
import { incStageError, startStageTimer } from '../metrics';
import { defaultClassifierReply } from './defaultClassifier';
import type { ClassifierRequest, ClassificationSource, ResponseClassifier } from './types';

type ClassifierTask = 'classify' | 'followup';

export interface HttpClassifierOptions {
  url?: string;
  apiKey?: string;
  timeoutMs?: number;
}

async function readResponseText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    log.debug({ err: error }, 'classifier error body unreadable');
    return '';
  }
}

function buildClassifierUrl(base: string, task: ClassifierTask): string {
  const trimmed = base.replace(/\/$/, '');
  return task === 'followup' ? `${trimmed}/followup` : `${trimmed}/classify`;
}

/**
 * Classifier reached over HTTP. Without a configured URL it answers locally
 * with keyword rules, the same way every environment without a model behaves.
 */
export class HttpClassifier implements ResponseClassifier {
  private readonly url?: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;

  constructor(options: HttpClassifierOptions = {}) {
    this.url = options.url ?? env.CLASSIFIER_URL;
    this.apiKey = options.apiKey ?? env.CLASSIFIER_API_KEY;
    this.timeoutMs = options.timeoutMs ?? env.CLASSIFIER_TIMEOUT_MS;
  }

  public async classify(request: ClassifierRequest): Promise<string> {
    if (!this.url) {
      this.logRoute(request, 'classifier_local_default', 'classify');
      return defaultClassifierReply(request.prompt);
    }

    this.logRoute(request, 'classifier_http', 'classify');
    return this.post(request, 'classify');
  }

  public async generateFollowup(request: ClassifierRequest): Promise<string | null> {
    if (!this.url) {
      return null;
    }

    try {
      const text = await this.post(request, 'followup');
      const cleaned = text.trim().replace(/^["']|["']$/g, '').trim();
      return cleaned === '' ? null : cleaned;
    } catch (error) {
      log.error(
        { err: error, event: 'followup_generation_failed', call_sid: request.callSid },
        'follow-up generation failed',
      );
      return null;
    }
  }

  private logRoute(request: ClassifierRequest, source: ClassificationSource, task: ClassifierTask): void {
    log.info(
      { event: 'classifier_route', source, task, call_sid: request.callSid, has_classifier_url: Boolean(this.url) },
      'classifier routed',
    );
  }

  private async post(request: ClassifierRequest, task: ClassifierTask): Promise<string> {
    const url = buildClassifierUrl(this.url ?? '', task);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const endTimer = startStageTimer(task === 'classify' ? 'classify' : 'followup_generate');

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ callSid: request.callSid, prompt: request.prompt }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await readResponseText(response);
        const preview = body.length > 500 ? `${body.slice(0, 500)}...` : body;
        throw new Error(`classifier ${task} failed ${response.status}: ${preview}`);
      }

      const data: unknown = await response.json();
      const text =
        typeof data === 'object' && data !== null && 'text' in data && typeof data.text === 'string'
          ? data.text
          : '';
      if (!text.trim()) {
        throw new Error(`classifier ${task} missing text`);
      }
      return text;
    } catch (error) {
      incStageError(task);
      throw error;
    } finally {
      clearTimeout(timeout);
      endTimer();
    }
  }
}
