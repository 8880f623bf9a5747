import assert from 'node:assert/strict';
import path from 'node:path';
import { test } from 'node:test';
import type { CallSession, CallSessionConfig } from '../src/calls/callSession';
import type { CallRecord } from '../src/calls/types';
import type { QuestionSource } from '../src/questions/types';
import type { RecognizerFactory } from '../src/stt/types';
import { FakeRecognizer, FakeSocket, FakeSynthesizer, ScriptedClassifier, reply, waitFor } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

const QUESTIONS_FILE = path.join(__dirname, '..', 'config', 'questions.json');
const FILLERS_FILE = path.join(__dirname, '..', 'config', 'fillers.json');

interface Harness {
  session: CallSession;
  socket: FakeSocket;
  recognizer: FakeRecognizer;
  synthesizer: FakeSynthesizer;
  questions: QuestionSource;
  records: CallRecord[];
  connected: Promise<void>;
}

interface HarnessOptions {
  config?: Partial<CallSessionConfig>;
  classifier?: ScriptedClassifier;
  synthesizer?: FakeSynthesizer;
  questions?: QuestionSource;
  openRecognizer?: RecognizerFactory;
}

async function createHarness(options: HarnessOptions = {}): Promise<Harness> {
  const { CallSession } = await import('../src/calls/callSession');
  const { DEFAULT_ENDPOINT_CONFIG } = await import('../src/calls/endpointDetector');
  const { QuestionStore } = await import('../src/questions/questionStore');
  const { FillerStore } = await import('../src/questions/fillerStore');

  const socket = new FakeSocket();
  const recognizer = new FakeRecognizer();
  const synthesizer = options.synthesizer ?? new FakeSynthesizer();
  const questions = options.questions ?? (await QuestionStore.load(QUESTIONS_FILE));
  const records: CallRecord[] = [];

  const config: CallSessionConfig = {
    flushFrames: 2,
    heartbeatMs: 60_000,
    pollMs: 10,
    replayMaxAttempts: 3,
    replayMinBytes: 1000,
    playbackAckTimeoutMs: 60_000,
    startTimeoutMs: 60_000,
    endpoint: {
      ...DEFAULT_ENDPOINT_CONFIG,
      fallbackMs: 20,
      punctuatedSilenceMs: 30,
      unpunctuatedSilenceMs: 30,
      shortTurnMs: 30,
      longTurnMs: 30,
      repromptMs: 60_000,
    },
    ...options.config,
  };

  const session = new CallSession({
    sessionId: 'session-test',
    socket,
    config,
    questions,
    fillers: await FillerStore.load(FILLERS_FILE),
    classifier: options.classifier ?? new ScriptedClassifier(),
    synthesizer,
    openRecognizer: options.openRecognizer ?? (async () => recognizer),
    onRecord: async (record) => {
      records.push(record);
    },
  });

  const connected = session.connect();
  await new Promise((resolve) => setImmediate(resolve));

  return { session, socket, recognizer, synthesizer, questions, records, connected };
}

function startFrame(): string {
  return JSON.stringify({
    event: 'start',
    start: {
      streamSid: 'MZ-test',
      callSid: 'CA-stream',
      customParameters: { callSid: 'CA-test', phoneNumber: '+15550100' },
    },
  });
}

function markFrame(name: string): string {
  return JSON.stringify({ event: 'mark', streamSid: 'MZ-test', mark: { name } });
}

function mediaFrame(bytes: number[]): string {
  return JSON.stringify({ event: 'media', streamSid: 'MZ-test', media: { payload: Buffer.from(bytes).toString('base64') } });
}

function ackAll(harness: Harness): void {
  for (const name of [...harness.session.pendingMarks]) {
    harness.session.handleMessage(markFrame(name));
  }
}

async function speak(harness: Harness, transcript: string, marksBefore: number): Promise<void> {
  harness.recognizer.emit({ transcript, speechFinal: true });
  await waitFor(() => harness.socket.marks().length > marksBefore);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function finish(harness: Harness): Promise<void> {
  await harness.session.teardown('test_done');
  await harness.connected;
}

test('the greeting plays on stream start and its mark hands the line to the caller', async () => {
  const harness = await createHarness();
  const { GREETING_TEXT } = await import('../src/questions/phrases');

  harness.session.handleMessage(startFrame());
  assert.equal(harness.session.phase, 'SPEAKING');
  assert.equal(harness.session.callSid, 'CA-test');
  assert.equal(harness.session.phoneNumber, '+15550100');

  await waitFor(() => harness.socket.marks().length === 1);
  assert.deepEqual(harness.synthesizer.requests, [GREETING_TEXT]);
  assert.equal(harness.socket.mediaBytes(), 4000);
  assert.ok(harness.socket.frames.every((frame) => frame.streamSid === 'MZ-test'));

  harness.session.handleMessage(markFrame('not-ours'));
  assert.equal(harness.session.phase, 'SPEAKING');

  ackAll(harness);
  assert.equal(harness.session.phase, 'LISTENING');

  await finish(harness);
});

test('a finalized answer advances and the synthesized question audio is kept', async () => {
  const harness = await createHarness();
  harness.session.handleMessage(startFrame());
  await waitFor(() => harness.socket.marks().length === 1);
  ackAll(harness);

  await speak(harness, 'hello', 1);

  assert.equal(harness.synthesizer.requests[1], harness.questions.getQuestion(1)?.text);
  assert.deepEqual(harness.questions.getAudio(1), { ready: true, audio: Buffer.alloc(4000, 0xff) });
  assert.equal(harness.session.conversation?.current?.questionIndex, 1);

  await finish(harness);
});

test('barge-in replays the last utterance at most three times', async () => {
  const harness = await createHarness();
  harness.session.handleMessage(startFrame());
  await waitFor(() => harness.socket.marks().length === 1);

  for (let attempt = 1; attempt <= 3; attempt += 1) {
    harness.recognizer.emit({ transcript: 'sorry what', isFinal: false });
    await waitFor(() => harness.session.replayAttempts === attempt);
  }
  assert.equal(harness.socket.marks().length, 4);
  assert.equal(harness.socket.mediaBytes(), 4 * 4000);

  harness.recognizer.emit({ transcript: 'sorry what', isFinal: false });
  await sleep(50);
  assert.equal(harness.session.replayAttempts, 3);
  assert.equal(harness.socket.marks().length, 4);

  ackAll(harness);
  assert.equal(harness.session.phase, 'LISTENING');

  await speak(harness, 'hello', 4);
  assert.equal(harness.session.replayAttempts, 0);

  await finish(harness);
});

test('barge-in is ignored when the last utterance is too short to replay', async () => {
  const harness = await createHarness({ synthesizer: new FakeSynthesizer(500) });
  harness.session.handleMessage(startFrame());
  await waitFor(() => harness.socket.marks().length === 1);

  harness.recognizer.emit({ transcript: 'wait', isFinal: false });
  await sleep(50);

  assert.equal(harness.session.replayAttempts, 0);
  assert.equal(harness.socket.marks().length, 1);
  assert.equal(harness.session.phase, 'SPEAKING');

  await finish(harness);
});

test('the end-call mark tears the call down and hands over the record', async () => {
  const { QuestionStore } = await import('../src/questions/questionStore');
  const { END_CALL_MARK } = await import('../src/transport/twilioMediaStream');
  const questions = QuestionStore.fromDefinitions([
    {
      state: 1,
      question: 'How many years of experience do you have?',
      expected_answer_type: 'years',
      response_categories: { years: 'Candidate gave a number of years' },
    },
  ]);
  const harness = await createHarness({
    questions,
    classifier: new ScriptedClassifier([reply('years', false, '5 years')]),
  });

  harness.session.handleMessage(startFrame());
  await waitFor(() => harness.socket.marks().length === 1);
  ackAll(harness);
  await speak(harness, 'hello', 1);
  ackAll(harness);
  await speak(harness, 'five years', 2);

  assert.equal(harness.socket.marks()[2], END_CALL_MARK);
  harness.session.handleMessage(markFrame(END_CALL_MARK));
  await harness.session.teardown('ignored');
  await harness.connected;

  assert.equal(harness.session.exiting, true);
  assert.deepEqual(harness.socket.closedWith, { code: 1000, reason: 'end_call' });
  assert.equal(harness.recognizer.closeCalls, 1);
  assert.equal(harness.records.length, 1);

  const record = harness.records[0];
  assert.equal(record.endReason, 'end_call');
  assert.equal(record.reachedTerminal, true);
  assert.equal(record.questionIndex, 2);
  assert.equal(record.callSid, 'CA-test');
  assert.equal(record.phoneNumber, '+15550100');
  assert.equal(record.streamSid, 'MZ-test');
  assert.equal(record.callerSpoke, true);
  assert.equal(record.streamStarted, true);
  assert.deepEqual(
    record.answers.map((answer) => [answer.questionIndex, answer.answer, answer.responseType]),
    [[1, 'five years', 'years']],
  );
});

test('a first follow-up is preceded by the question filler', async () => {
  const harness = await createHarness({ classifier: new ScriptedClassifier([reply('irrelevant', true)]) });
  const followup = 'Could you tell me roughly how many years you have been working?';

  harness.session.handleMessage(startFrame());
  await waitFor(() => harness.socket.marks().length === 1);
  ackAll(harness);
  await speak(harness, 'hello', 1);
  ackAll(harness);

  harness.recognizer.emit({ transcript: 'what do you mean', speechFinal: true });
  await waitFor(() => harness.socket.marks().length === 4);

  assert.deepEqual(harness.synthesizer.requests.slice(2), [followup, 'Okay... tell me']);
  assert.equal(harness.session.phase, 'SPEAKING');
  ackAll(harness);
  assert.equal(harness.session.phase, 'LISTENING');

  await finish(harness);
});

test('malformed frames are ignored and stop tears the call down', async () => {
  const harness = await createHarness();

  harness.session.handleMessage('not json');
  harness.session.handleMessage('{"event":"mark"}');
  assert.equal(harness.session.phase, 'CONNECTED');

  harness.session.handleMessage(startFrame());
  harness.session.handleMessage('{"event":"stop","streamSid":"MZ-test"}');
  await harness.session.teardown('ignored');
  await harness.connected;

  assert.equal(harness.records[0].endReason, 'stop');
  assert.equal(harness.records[0].callerSpoke, false);
  assert.equal(harness.records[0].questionIndex, 0);
});

test('inbound media is batched before reaching the recognizer', async () => {
  const harness = await createHarness();
  harness.session.handleMessage(startFrame());

  harness.session.handleMessage(mediaFrame([1, 2]));
  assert.equal(harness.recognizer.sent.length, 0);
  harness.session.handleMessage(mediaFrame([3]));
  harness.session.handleMessage(mediaFrame([4]));

  assert.deepEqual(harness.recognizer.sent, [Buffer.from([1, 2, 3])]);

  await finish(harness);
});

test('the call keeps running without a recognizer', async () => {
  const harness = await createHarness({
    openRecognizer: async () => {
      throw new Error('recognizer refused');
    },
  });
  await harness.connected;

  harness.session.handleMessage(startFrame());
  harness.session.handleMessage(mediaFrame([1]));
  harness.session.handleMessage(mediaFrame([2]));
  await waitFor(() => harness.socket.marks().length === 1);

  assert.equal(harness.recognizer.sent.length, 0);
  await harness.session.teardown('test_done');
  assert.equal(harness.recognizer.closeCalls, 0);
});

test('a stream that never starts times out', async () => {
  const harness = await createHarness({ config: { heartbeatMs: 10, startTimeoutMs: 20 } });

  await waitFor(() => harness.records.length === 1);
  await harness.connected;

  assert.equal(harness.records[0].endReason, 'start_timeout');
  assert.equal(harness.records[0].streamStarted, false);
});

test('unacknowledged playback falls back to listening', async () => {
  const harness = await createHarness({ config: { heartbeatMs: 10, playbackAckTimeoutMs: 30 } });
  harness.session.handleMessage(startFrame());

  await waitFor(() => harness.session.phase === 'LISTENING');
  assert.deepEqual(harness.session.pendingMarks, []);

  await finish(harness);
});

test('long silence plays the reprompt', async () => {
  const { DEFAULT_ENDPOINT_CONFIG } = await import('../src/calls/endpointDetector');
  const { REPROMPT_TEXT } = await import('../src/questions/phrases');
  const harness = await createHarness({ config: { endpoint: { ...DEFAULT_ENDPOINT_CONFIG, repromptMs: 40 } } });

  harness.session.handleMessage(startFrame());
  await waitFor(() => harness.socket.marks().length === 1);
  ackAll(harness);

  await waitFor(() => harness.socket.marks().length === 2);
  assert.equal(harness.synthesizer.requests[1], REPROMPT_TEXT);

  await finish(harness);
  assert.equal(harness.records[0].transcript[1].text, REPROMPT_TEXT);
});
