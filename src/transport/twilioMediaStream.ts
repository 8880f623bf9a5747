import { z } from 'zod';
import type { InboundMediaEvent, OutboundMediaEvent } from './types';

export const END_CALL_MARK = 'end call';

const ConnectedSchema = z.object({
  event: z.literal('connected'),
  protocol: z.string().optional(),
});

const StartSchema = z.object({
  event: z.literal('start'),
  sequenceNumber: z.string().optional(),
  streamSid: z.string().optional(),
  start: z.object({
    streamSid: z.string().min(1),
    callSid: z.string().min(1),
    customParameters: z.record(z.string()).default({}),
    mediaFormat: z
      .object({
        encoding: z.string(),
        sampleRate: z.coerce.number(),
        channels: z.coerce.number(),
      })
      .optional(),
  }),
});

const MediaSchema = z.object({
  event: z.literal('media'),
  streamSid: z.string().optional(),
  media: z.object({
    payload: z.string(),
    chunk: z.coerce.number().optional(),
    track: z.string().optional(),
  }),
});

const MarkSchema = z.object({
  event: z.literal('mark'),
  streamSid: z.string().optional(),
  sequenceNumber: z.string().optional(),
  mark: z.object({ name: z.string() }),
});

const StopSchema = z.object({
  event: z.literal('stop'),
  streamSid: z.string().optional(),
  stop: z.object({ callSid: z.string().optional() }).optional(),
});

const EnvelopeSchema = z.object({ event: z.string().min(1) });

/**
 * Decodes one text frame from the media stream websocket.
 * Throws when the frame is not JSON or a known event is malformed.
 */
export function parseInboundEvent(raw: string): InboundMediaEvent {
  const payload: unknown = JSON.parse(raw);
  const envelope = EnvelopeSchema.parse(payload);

  switch (envelope.event) {
    case 'connected': {
      const parsed = ConnectedSchema.parse(payload);
      return { kind: 'connected', protocol: parsed.protocol };
    }
    case 'start': {
      const parsed = StartSchema.parse(payload);
      return { kind: 'start', sequenceNumber: parsed.sequenceNumber, start: parsed.start };
    }
    case 'media': {
      const parsed = MediaSchema.parse(payload);
      return {
        kind: 'media',
        streamSid: parsed.streamSid,
        payload: Buffer.from(parsed.media.payload, 'base64'),
        chunk: parsed.media.chunk,
      };
    }
    case 'mark': {
      const parsed = MarkSchema.parse(payload);
      return {
        kind: 'mark',
        streamSid: parsed.streamSid,
        name: parsed.mark.name,
        sequenceNumber: parsed.sequenceNumber,
      };
    }
    case 'stop': {
      const parsed = StopSchema.parse(payload);
      return { kind: 'stop', streamSid: parsed.streamSid, callSid: parsed.stop?.callSid };
    }
    case 'closed':
      return { kind: 'closed' };
    default:
      return { kind: 'unknown', event: envelope.event };
  }
}

export function serializeOutbound(event: OutboundMediaEvent): string {
  return JSON.stringify(event);
}

export function mediaFrame(streamSid: string, payload: string): string {
  return serializeOutbound({ event: 'media', streamSid, media: { payload } });
}

export function markFrame(streamSid: string, name: string): string {
  return serializeOutbound({ event: 'mark', streamSid, mark: { name } });
}
