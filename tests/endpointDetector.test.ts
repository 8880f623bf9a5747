import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  DEFAULT_ENDPOINT_CONFIG,
  EndpointDetector,
  silenceThresholdMs,
  turnThresholdMs,
} from '../src/calls/endpointDetector';
import type { RecognizerEvent } from '../src/stt/types';

function final(transcript: string, confidence = 0.95, speechFinal = false): RecognizerEvent {
  return { transcript, confidence, isFinal: true, speechFinal };
}

function words(count: number): string {
  return Array.from({ length: count }, (_, index) => `word${index}`).join(' ');
}

test('thresholds depend on punctuation and utterance length', () => {
  assert.equal(silenceThresholdMs('I can join.'), 1000);
  assert.equal(silenceThresholdMs('I can join'), 1400);
  assert.equal(turnThresholdMs(words(29)), 1000);
  assert.equal(turnThresholdMs(words(30)), 1200);
});

test('speech final waits for the fallback window and then punctuated silence', () => {
  const detector = new EndpointDetector(DEFAULT_ENDPOINT_CONFIG, 0);
  detector.onEvent(final('I can join next month.', 0.95, true), 1000);
  assert.equal(detector.phase, 'FALLBACK');

  assert.equal(detector.tick(1299, false), null);
  assert.equal(detector.tick(1300, false), null);
  assert.equal(detector.phase, 'SILENCE');
  assert.equal(detector.tick(2299, false), null);
  assert.deepEqual(detector.tick(2300, false), { kind: 'finalize', text: 'I can join next month.' });
  assert.equal(detector.phase, 'COLLECTING');
  assert.equal(detector.text, '');
});

test('long punctuated utterances still finalize after the short silence', () => {
  const detector = new EndpointDetector(DEFAULT_ENDPOINT_CONFIG, 0);
  const text = `${words(35)}.`;
  detector.onEvent(final(text, 0.95, true), 0);

  assert.equal(detector.tick(1299, false), null);
  assert.deepEqual(detector.tick(1300, false), { kind: 'finalize', text });
});

test('unpunctuated text needs the longer silence', () => {
  const detector = new EndpointDetector(DEFAULT_ENDPOINT_CONFIG, 0);
  detector.onEvent(final('I can join next month', 0.95, true), 1000);

  assert.equal(detector.tick(1300, false), null);
  assert.equal(detector.tick(2699, false), null);
  assert.deepEqual(detector.tick(2700, false), { kind: 'finalize', text: 'I can join next month' });
});

test('a fragment during the fallback window extends it with the relaxed threshold', () => {
  const detector = new EndpointDetector(DEFAULT_ENDPOINT_CONFIG, 0);
  detector.onEvent(final('I can join', 0.95, true), 1000);
  detector.onEvent(final('next month', 0.85), 1100);

  assert.equal(detector.text, 'I can join next month');
  assert.equal(detector.tick(1399, false), null);
  assert.equal(detector.tick(1400, false), null);
  assert.equal(detector.tick(2799, false), null);
  assert.deepEqual(detector.tick(2800, false), { kind: 'finalize', text: 'I can join next month' });
});

test('without an end-of-utterance flag the turn timer finalizes', () => {
  const short = new EndpointDetector(DEFAULT_ENDPOINT_CONFIG, 0);
  short.onEvent(final('five years'), 1000);
  assert.equal(short.tick(1999, false), null);
  assert.deepEqual(short.tick(2000, false), { kind: 'finalize', text: 'five years' });

  const long = new EndpointDetector(DEFAULT_ENDPOINT_CONFIG, 0);
  const text = words(30);
  long.onEvent(final(text), 1000);
  assert.equal(long.tick(2199, false), null);
  assert.deepEqual(long.tick(2200, false), { kind: 'finalize', text });
});

test('low confidence fragments only reach the preview', () => {
  const detector = new EndpointDetector(DEFAULT_ENDPOINT_CONFIG, 0);
  detector.onEvent(final('maybe', 0.5, true), 1000);

  assert.equal(detector.text, '');
  assert.equal(detector.preview, 'maybe');
  assert.equal(detector.phase, 'COLLECTING');
  assert.equal(detector.tick(3000, false), null);
});

test('low confidence finals do not hold back the turn timer', () => {
  const detector = new EndpointDetector(DEFAULT_ENDPOINT_CONFIG, 0);
  detector.onEvent(final('five years'), 1000);
  detector.onEvent(final('um', 0.4), 1800);

  assert.equal(detector.text, 'five years');
  assert.equal(detector.tick(1999, false), null);
  assert.deepEqual(detector.tick(2000, false), { kind: 'finalize', text: 'five years' });
});

test('interim results keep the caller active without buffering', () => {
  const detector = new EndpointDetector(DEFAULT_ENDPOINT_CONFIG, 0);
  detector.onEvent({ transcript: 'I think', confidence: 0.99, isFinal: false, speechFinal: false }, 4000);

  assert.equal(detector.text, '');
  assert.equal(detector.tick(5000, false), null);
  assert.deepEqual(detector.tick(9000, false), { kind: 'reprompt' });
});

test('long silence reprompts once per window and never while speaking', () => {
  const detector = new EndpointDetector(DEFAULT_ENDPOINT_CONFIG, 0);

  assert.equal(detector.tick(4999, false), null);
  assert.deepEqual(detector.tick(5000, false), { kind: 'reprompt' });
  assert.equal(detector.tick(5001, false), null);

  assert.equal(detector.tick(6000, true), null);
  assert.equal(detector.tick(10999, false), null);
  assert.deepEqual(detector.tick(11000, false), { kind: 'reprompt' });
});

test('reset drops the buffered turn', () => {
  const detector = new EndpointDetector(DEFAULT_ENDPOINT_CONFIG, 0);
  detector.onEvent(final('hello', 0.95, true), 100);
  detector.reset(200);

  assert.equal(detector.text, '');
  assert.equal(detector.phase, 'COLLECTING');
  assert.equal(detector.tick(5199, false), null);
});
