import type { ScriptedQuestion } from '../questions/types';

export interface FollowupExchange {
  question: string;
  answer: string;
}

export interface ClassificationPromptInput {
  question: ScriptedQuestion;
  answer: string;
  followups: FollowupExchange[];
}

export function buildClassificationPrompt(input: ClassificationPromptInput): string {
  const lines: string[] = [
    `State: ${input.question.index}`,
    `Question: ${input.question.text}`,
    `User response: ${input.answer}`,
  ];

  if (input.followups.length > 0) {
    lines.push('', 'Previous follow-ups:');
    input.followups.forEach((exchange, idx) => {
      lines.push(`Follow-up ${idx + 1}: ${exchange.question}`);
      lines.push(`Response ${idx + 1}: ${exchange.answer}`);
    });
  }

  lines.push('', 'Decide which category the response falls into. Categories:');
  for (const [category, description] of Object.entries(input.question.categories)) {
    lines.push(`- ${category}: ${description}`);
  }

  const categoryList = Object.keys(input.question.categories)
    .map((category) => `"${category}"`)
    .join(', ');

  lines.push(
    'Answer with JSON only:',
    '{',
    `  "response_type": one of ${categoryList || '"default"'}, or "default",`,
    '  "extracted_value": the value stated by the caller, if any,',
    '  "needs_followup": true or false',
    '}',
  );

  return lines.join('\n');
}

export interface FollowupPromptInput extends ClassificationPromptInput {
  responseType: string;
  extractedValues: Record<string, string>;
  attempt: number;
}

export function buildFollowupPrompt(input: FollowupPromptInput): string {
  const extracted = Object.entries(input.extractedValues)
    .map(([key, value]) => `${key}=${value}`)
    .join(', ');

  const lines: string[] = [
    `Original question: ${input.question.text}`,
    `Caller's response: ${input.answer}`,
    `Expected information: ${input.question.expectedAnswerKind}`,
    `Response type detected: ${input.responseType}`,
    `Extracted values: ${extracted || 'none'}`,
  ];

  if (input.followups.length > 0) {
    lines.push('', 'Previous follow-ups:');
    for (const exchange of input.followups) {
      lines.push(`Follow-up: ${exchange.question}`, `Caller: ${exchange.answer}`);
    }
  }

  lines.push(
    '',
    `This is follow-up attempt #${input.attempt}.`,
    'Write one short, friendly spoken question that asks the caller for the missing information.',
    'Reply with the question only.',
  );

  return lines.join('\n');
}
