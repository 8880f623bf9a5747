import { promises as fs } from 'fs';
import { z } from 'zod';
import { log } from '../log';
import { withRetry } from '../retry';
import type { SpeechSynthesizer } from '../tts/types';
import type { QuestionAudio, QuestionSource, ScriptedQuestion } from './types';

const DEFAULT_MAX_FOLLOWUPS = 2;

const QuestionDefinitionSchema = z.object({
  state: z.number().int().positive(),
  question: z.string().min(1),
  expected_answer_type: z.string().min(1),
  max_followups: z.number().int().min(0).default(DEFAULT_MAX_FOLLOWUPS),
  threshold_days: z.number().positive().optional(),
  response_categories: z.record(z.string()).default({}),
  follow_up_instructions: z.record(z.string()).default({}),
});

const QuestionFileSchema = z.array(QuestionDefinitionSchema).min(1);

export type QuestionDefinition = z.input<typeof QuestionDefinitionSchema>;

function toScriptedQuestion(definition: z.infer<typeof QuestionDefinitionSchema>): ScriptedQuestion {
  return {
    index: definition.state,
    text: definition.question,
    expectedAnswerKind: definition.expected_answer_type,
    categories: definition.response_categories,
    followupTemplates: definition.follow_up_instructions,
    maxFollowups: definition.max_followups,
    thresholdDays: definition.threshold_days,
  };
}

/**
 * Scripted interview questions and their pre-synthesized audio.
 * Shared by every call; read-only once pre-generation has finished.
 */
export class QuestionStore implements QuestionSource {
  private readonly questions = new Map<number, ScriptedQuestion>();
  private readonly audio = new Map<number, Buffer>();

  constructor(questions: ScriptedQuestion[]) {
    for (const question of questions) {
      this.questions.set(question.index, question);
    }

    for (let index = 1; index <= this.questions.size; index += 1) {
      if (!this.questions.has(index)) {
        throw new Error(`question states must be contiguous from 1; missing state ${index}`);
      }
    }
  }

  public static fromDefinitions(definitions: unknown): QuestionStore {
    const result = QuestionFileSchema.safeParse(definitions);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join(', ');
      throw new Error(`Invalid question definitions: ${issues}`);
    }
    return new QuestionStore(result.data.map(toScriptedQuestion));
  }

  public static async load(filePath: string): Promise<QuestionStore> {
    const raw = await fs.readFile(filePath, 'utf8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      log.error({ err: error, path: filePath }, 'question file json parse failed');
      throw error;
    }

    const store = QuestionStore.fromDefinitions(parsed);
    log.info(
      { event: 'questions_loaded', path: filePath, question_count: store.questionCount },
      'questions loaded',
    );
    return store;
  }

  public get questionCount(): number {
    return this.questions.size;
  }

  public get audioReadyCount(): number {
    return this.audio.size;
  }

  public getQuestion(index: number): ScriptedQuestion | undefined {
    return this.questions.get(index);
  }

  public getAudio(index: number): QuestionAudio {
    const audio = this.audio.get(index);
    return audio ? { ready: true, audio } : { ready: false };
  }

  public storeAudio(index: number, audio: Buffer): void {
    if (!this.questions.has(index) || audio.length === 0) {
      return;
    }
    this.audio.set(index, audio);
  }

  /** Synthesizes every question that has no audio yet. Failures leave that question to on-demand synthesis. */
  public async pregenerate(synthesizer: SpeechSynthesizer): Promise<number> {
    let generated = 0;
    for (const question of this.questions.values()) {
      if (this.audio.has(question.index)) {
        continue;
      }
      try {
        const audio = await withRetry(() => synthesizer.synthesize({ text: question.text }), {
          label: 'question_audio',
          retries: 2,
        });
        this.storeAudio(question.index, audio);
        generated += 1;
      } catch (error) {
        log.warn(
          { err: error, event: 'question_audio_failed', question_index: question.index },
          'question audio pre-generation failed',
        );
      }
    }

    log.info(
      { event: 'question_audio_ready', generated, ready: this.audio.size, total: this.questions.size },
      'question audio pre-generation finished',
    );
    return generated;
  }
}
