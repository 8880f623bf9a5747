/** The outbound half of a media stream connection. */
export interface MediaSocket {
  readonly isOpen: boolean;
  send(frame: string): void;
  close(code?: number, reason?: string): void;
}

export type OutboundMediaEvent =
  | { event: 'media'; streamSid: string; media: { payload: string } }
  | { event: 'mark'; streamSid: string; mark: { name: string } };

export interface StreamStart {
  streamSid: string;
  callSid: string;
  customParameters: Record<string, string>;
  mediaFormat?: { encoding: string; sampleRate: number; channels: number };
}

export type InboundMediaEvent =
  | { kind: 'connected'; protocol?: string }
  | { kind: 'start'; sequenceNumber?: string; start: StreamStart }
  | { kind: 'media'; streamSid?: string; payload: Buffer; chunk?: number }
  | { kind: 'mark'; streamSid?: string; name: string; sequenceNumber?: string }
  | { kind: 'stop'; streamSid?: string; callSid?: string }
  | { kind: 'closed' }
  | { kind: 'unknown'; event: string };
