import assert from 'node:assert/strict';
import path from 'node:path';
import { test } from 'node:test';
import type { SpeechSynthesizer } from '../src/tts/types';
import { setTestEnv } from './testEnv';

setTestEnv();

const QUESTIONS_FILE = path.join(__dirname, '..', 'config', 'questions.json');
const FILLERS_FILE = path.join(__dirname, '..', 'config', 'fillers.json');

function definition(state: number) {
  return {
    state,
    question: `Question ${state}?`,
    expected_answer_type: 'text',
    response_categories: { answered: 'Candidate answered' },
  };
}

test('QuestionStore loads the shipped interview script', async () => {
  const { QuestionStore } = await import('../src/questions/questionStore');
  const store = await QuestionStore.load(QUESTIONS_FILE);

  assert.equal(store.questionCount, 5);
  assert.equal(store.getQuestion(0), undefined);
  assert.equal(store.getQuestion(6), undefined);

  const notice = store.getQuestion(5);
  assert.equal(notice?.thresholdDays, 60);
  assert.equal(notice?.maxFollowups, 2);
  assert.equal(notice?.followupTemplates.long_notice, 'Would it be possible to shorten that notice period?');
});

test('QuestionStore applies defaults and rejects gaps', async () => {
  const { QuestionStore } = await import('../src/questions/questionStore');

  const store = QuestionStore.fromDefinitions([definition(1), definition(2)]);
  assert.equal(store.getQuestion(2)?.maxFollowups, 2);
  assert.deepEqual(store.getQuestion(2)?.followupTemplates, {});

  assert.throws(() => QuestionStore.fromDefinitions([definition(1), definition(3)]), /missing state 2/);
  assert.throws(() => QuestionStore.fromDefinitions([{ state: 1 }]), /Invalid question definitions/);
  assert.throws(() => QuestionStore.fromDefinitions([]), /Invalid question definitions/);
});

test('QuestionStore keeps audio only for known questions', async () => {
  const { QuestionStore } = await import('../src/questions/questionStore');
  const store = QuestionStore.fromDefinitions([definition(1)]);

  assert.deepEqual(store.getAudio(1), { ready: false });
  store.storeAudio(1, Buffer.alloc(0));
  store.storeAudio(7, Buffer.from([1, 2, 3]));
  assert.equal(store.audioReadyCount, 0);

  store.storeAudio(1, Buffer.from([1, 2, 3]));
  assert.deepEqual(store.getAudio(1), { ready: true, audio: Buffer.from([1, 2, 3]) });
});

test('QuestionStore.pregenerate leaves failed questions for on-demand synthesis', async () => {
  const { QuestionStore } = await import('../src/questions/questionStore');
  const store = QuestionStore.fromDefinitions([definition(1), definition(2), definition(3)]);
  store.storeAudio(3, Buffer.from([9]));

  const requested: string[] = [];
  const synthesizer: SpeechSynthesizer = {
    synthesize: async ({ text }) => {
      requested.push(text);
      if (text === 'Question 2?') {
        throw new Error('voice rejected');
      }
      return Buffer.from(text);
    },
    stream: async function* () {
      yield '';
    },
  };

  const generated = await store.pregenerate(synthesizer);

  assert.equal(generated, 1);
  assert.deepEqual(requested, ['Question 1?', 'Question 2?']);
  assert.deepEqual(store.getAudio(1), { ready: true, audio: Buffer.from('Question 1?') });
  assert.deepEqual(store.getAudio(2), { ready: false });
  assert.equal(store.audioReadyCount, 2);
});

test('FillerStore prefers the question filler and otherwise picks a generic one', async () => {
  const { FillerStore } = await import('../src/questions/fillerStore');

  const fromFile = await FillerStore.load(FILLERS_FILE);
  assert.equal(fromFile.getFiller(1), 'Okay... tell me');

  const store = FillerStore.fromDefinitions({ generic: ['I see...', 'Hmm...', 'Interesting...'] }, () => 0.5);
  assert.equal(store.getFiller(3), 'Hmm...');

  const edge = FillerStore.fromDefinitions({ generic: ['I see...', 'Hmm...'] }, () => 0.99999);
  assert.equal(edge.getFiller(1), 'Hmm...');
});
