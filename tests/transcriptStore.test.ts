import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import type { CallRecord } from '../src/calls/types';
import { setTestEnv } from './testEnv';

setTestEnv();

function record(overrides: Partial<CallRecord> = {}): CallRecord {
  const at = new Date(1_700_000_000_500);
  return {
    sessionId: 'session-test',
    callSid: 'CA-test',
    streamSid: 'MZ-test',
    phoneNumber: '+15550100',
    questionCount: 5,
    questionIndex: 1,
    reachedTerminal: false,
    callerSpoke: true,
    streamStarted: true,
    endReason: 'stop',
    startedAt: at,
    endedAt: new Date(1_700_000_060_000),
    answers: [],
    transcript: [
      { questionIndex: 0, speaker: 'ai', text: 'Hello', at },
      { questionIndex: 0, speaker: 'user', text: 'hi', at },
      { questionIndex: 1, speaker: 'ai', text: 'Q1?', at },
      { questionIndex: 1, speaker: 'user', text: 'five years', at },
    ],
    ...overrides,
  };
}

test('transcriptFileName uses the phone number, then the call sid', async () => {
  const { transcriptFileName } = await import('../src/history/transcriptStore');

  assert.equal(transcriptFileName(record()), '+15550100_1700000000.txt');
  assert.equal(transcriptFileName(record({ phoneNumber: undefined, callSid: 'CA/../x' })), 'CA____x_1700000000.txt');
  assert.equal(
    transcriptFileName(record({ phoneNumber: undefined, callSid: undefined })),
    'session-test_1700000000.txt',
  );
});

test('formatTranscript groups lines by question', async () => {
  const { formatTranscript } = await import('../src/history/transcriptStore');

  assert.equal(
    formatTranscript(record()),
    [
      'Call SID: CA-test',
      'Phone Number: +15550100',
      '',
      '--- State 0 ---',
      'AI: Hello',
      'User: hi',
      '',
      '--- State 1 ---',
      'AI: Q1?',
      'User: five years',
      '',
    ].join('\n'),
  );
  assert.ok(formatTranscript(record({ callSid: undefined, phoneNumber: undefined, transcript: [] })).startsWith(
    'Call SID: unknown\nPhone Number: unknown',
  ));
});

test('TranscriptRecorder writes under the raw directory', async () => {
  const { TranscriptRecorder, formatTranscript } = await import('../src/history/transcriptStore');
  const baseDir = await fs.mkdtemp(path.join(os.tmpdir(), 'transcripts-'));
  const recorder = new TranscriptRecorder(baseDir);

  try {
    const written = await recorder.save(record());
    assert.equal(written, path.join(baseDir, 'raw', '+15550100_1700000000.txt'));
    assert.equal(await fs.readFile(path.join(baseDir, 'raw', '+15550100_1700000000.txt'), 'utf8'), formatTranscript(record()));

    assert.equal(await recorder.save(record({ transcript: [] })), null);
  } finally {
    await fs.rm(baseDir, { recursive: true, force: true });
  }
});
