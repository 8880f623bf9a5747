import { promises as fs } from 'fs';
import path from 'path';
import { log } from '../log';
import type { CallRecord } from '../calls/types';

function sanitizeSegment(value: string): string {
  const sanitized = value.replace(/[^a-zA-Z0-9+_-]/g, '_').slice(0, 48);
  return sanitized.length > 0 ? sanitized : 'unknown';
}

export function transcriptFileName(record: CallRecord): string {
  const owner = record.phoneNumber ?? record.callSid ?? record.sessionId;
  const timestamp = Math.floor(record.startedAt.getTime() / 1000);
  return `${sanitizeSegment(owner)}_${timestamp}.txt`;
}

export function formatTranscript(record: CallRecord): string {
  const lines = [`Call SID: ${record.callSid ?? 'unknown'}`, `Phone Number: ${record.phoneNumber ?? 'unknown'}`];

  let section: number | undefined;
  for (const entry of record.transcript) {
    if (entry.questionIndex !== section) {
      section = entry.questionIndex;
      lines.push('', `--- State ${section} ---`);
    }
    lines.push(`${entry.speaker === 'ai' ? 'AI' : 'User'}: ${entry.text}`);
  }

  return `${lines.join('\n')}\n`;
}

/** Writes one plain-text transcript per call under `<dir>/raw`. */
export class TranscriptRecorder {
  private readonly rawDir: string;

  constructor(baseDir: string) {
    this.rawDir = path.join(baseDir, 'raw');
  }

  public async save(record: CallRecord): Promise<string | null> {
    if (record.transcript.length === 0) {
      log.info(
        { event: 'transcript_skipped', session_id: record.sessionId, call_sid: record.callSid },
        'no transcript to save',
      );
      return null;
    }

    const filePath = path.join(this.rawDir, transcriptFileName(record));
    await fs.mkdir(this.rawDir, { recursive: true });
    await fs.writeFile(filePath, formatTranscript(record), 'utf8');

    log.info(
      { event: 'transcript_saved', session_id: record.sessionId, call_sid: record.callSid, path: filePath },
      'transcript saved',
    );
    return filePath;
  }
}
