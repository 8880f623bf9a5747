import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  cleanTranscript,
  endsWithTerminalPunctuation,
  mergeTranscript,
  overlapLength,
} from '../src/stt/transcriptMerge';

test('mergeTranscript starts from an empty buffer', () => {
  assert.equal(mergeTranscript('', 'hello there'), 'hello there');
  assert.equal(mergeTranscript('hello there', '   '), 'hello there');
});

test('mergeTranscript drops fragments already contained in the buffer', () => {
  assert.equal(mergeTranscript('I have five years of experience', 'five years'), 'I have five years of experience');
  assert.equal(mergeTranscript('My notice period is sixty days.', 'Sixty days'), 'My notice period is sixty days.');
});

test('mergeTranscript removes the overlap between buffer tail and fragment head', () => {
  assert.equal(mergeTranscript('I have five years', 'five years of experience'), 'I have five years of experience');
});

test('mergeTranscript appends fragments without overlap', () => {
  assert.equal(mergeTranscript('I am', 'currently employed'), 'I am currently employed');
});

test('overlapLength finds the longest suffix that prefixes the fragment', () => {
  assert.equal(overlapLength(['a', 'b'], ['b', 'c']), 1);
  assert.equal(overlapLength(['a', 'b', 'c'], ['b', 'c', 'd']), 2);
  assert.equal(overlapLength(['a', 'b'], ['c', 'd']), 0);
  assert.equal(overlapLength(['x', 'a', 'b'], ['a', 'b', 'c'], 1), 0);
});

test('cleanTranscript removes repeated sentences', () => {
  assert.equal(cleanTranscript('I can join.  I can join. Next month.'), 'I can join. Next month.');
});

test('cleanTranscript drops the first copy of a stuttered phrase', () => {
  assert.equal(
    cleanTranscript('my current salary my current salary is ten lakhs'),
    'my current salary is ten lakhs',
  );
});

test('cleanTranscript leaves short utterances alone', () => {
  assert.equal(cleanTranscript('yes yes yes'), 'yes yes yes');
});

test('endsWithTerminalPunctuation', () => {
  assert.equal(endsWithTerminalPunctuation('Done.'), true);
  assert.equal(endsWithTerminalPunctuation('really?"'), true);
  assert.equal(endsWithTerminalPunctuation('and then'), false);
});
