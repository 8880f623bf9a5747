import { Router } from 'express';
import { z } from 'zod';
import { env } from '../env';
import { log } from '../log';

export const MEDIA_STREAM_PATH = '/v1/twilio/media';

const voiceWebhookSchema = z
  .object({
    CallSid: z.string().min(1),
    From: z.string().optional(),
    To: z.string().optional(),
    Direction: z.string().optional(),
  })
  .passthrough();

const statusWebhookSchema = z
  .object({
    CallSid: z.string().min(1),
    CallStatus: z.string().optional(),
    CallDuration: z.string().optional(),
  })
  .passthrough();

export interface TwilioWebhookOptions {
  publicBaseUrl?: string;
  mediaStreamToken?: string;
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function buildMediaStreamUrl(publicBaseUrl: string, token: string): string {
  const trimmedBase = publicBaseUrl.replace(/\/$/, '');
  let wsBase = trimmedBase;
  if (trimmedBase.startsWith('https://')) {
    wsBase = `wss://${trimmedBase.slice('https://'.length)}`;
  } else if (trimmedBase.startsWith('http://')) {
    wsBase = `ws://${trimmedBase.slice('http://'.length)}`;
  } else if (!trimmedBase.startsWith('ws://') && !trimmedBase.startsWith('wss://')) {
    wsBase = `wss://${trimmedBase}`;
  }
  return `${wsBase}${MEDIA_STREAM_PATH}?token=${encodeURIComponent(token)}`;
}

/** The candidate's number: the dialled party on outbound calls, the caller otherwise. */
export function candidateNumber(body: { From?: string; To?: string; Direction?: string }): string | undefined {
  const outbound = body.Direction?.startsWith('outbound') ?? false;
  return outbound ? body.To : body.From;
}

export function buildStreamTwiml(streamUrl: string, parameters: Record<string, string | undefined>): string {
  const params = Object.entries(parameters)
    .filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1] !== '')
    .map(([name, value]) => `<Parameter name="${escapeXml(name)}" value="${escapeXml(value)}"/>`)
    .join('');

  return (
    '<?xml version="1.0" encoding="UTF-8"?>' +
    `<Response><Connect><Stream url="${escapeXml(streamUrl)}">${params}</Stream></Connect></Response>`
  );
}

export function createTwilioWebhookRouter(options: TwilioWebhookOptions = {}): Router {
  const router = Router();
  const publicBaseUrl = options.publicBaseUrl ?? env.PUBLIC_BASE_URL;
  const token = options.mediaStreamToken ?? env.MEDIA_STREAM_TOKEN;

  router.post('/voice', (req, res) => {
    const parsed = voiceWebhookSchema.safeParse(req.body);
    if (!parsed.success) {
      log.warn(
        { event: 'voice_webhook_invalid', issues: parsed.error.issues.length, requestId: req.id },
        'invalid voice webhook',
      );
      res.status(400).json({ error: 'invalid_payload' });
      return;
    }

    const body = parsed.data;
    const phoneNumber = candidateNumber(body);
    log.info(
      { event: 'voice_webhook', call_sid: body.CallSid, direction: body.Direction, requestId: req.id },
      'voice webhook received',
    );

    res
      .status(200)
      .type('text/xml')
      .send(buildStreamTwiml(buildMediaStreamUrl(publicBaseUrl, token), { callSid: body.CallSid, phoneNumber }));
  });

  router.post('/status', (req, res) => {
    const parsed = statusWebhookSchema.safeParse(req.body);
    if (!parsed.success) {
      log.warn({ event: 'status_webhook_invalid', requestId: req.id }, 'invalid status webhook');
      res.status(400).json({ error: 'invalid_payload' });
      return;
    }

    log.info(
      {
        event: 'call_status',
        call_sid: parsed.data.CallSid,
        call_status: parsed.data.CallStatus,
        call_duration: parsed.data.CallDuration,
        requestId: req.id,
      },
      'call status received',
    );
    res.status(204).end();
  });

  return router;
}
