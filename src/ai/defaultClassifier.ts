import { parseDurationDays } from './durationParser';

/**
 * Keyword classifier used when no classifier service is configured.
 * Produces the same JSON text shape the remote classifier returns.
 */
export function defaultClassifierReply(prompt: string): string {
  const answer = /^User response: (.*)$/m.exec(prompt)?.[1]?.trim().toLowerCase() ?? '';
  const categories = new Set(
    Array.from(prompt.matchAll(/^- ([a-z_]+):/gm), (match) => match[1]),
  );

  const reply = (responseType: string, extractedValue: string | null, needsFollowup: boolean): string =>
    JSON.stringify({ response_type: responseType, extracted_value: extractedValue, needs_followup: needsFollowup });

  if (answer === '') {
    return reply('irrelevant', null, true);
  }

  if (categories.has('yes') && /\b(yes|yeah|yep|i do|i have)\b/.test(answer)) {
    return reply('yes', null, true);
  }
  if (categories.has('no') && /\b(no|nope|none|not really)\b/.test(answer)) {
    return reply('no', null, false);
  }

  if (categories.has('not_comfortable') && /\b(rather not|prefer not|not comfortable|won't share)\b/.test(answer)) {
    return reply('not_comfortable', null, false);
  }

  if (categories.has('immediate') && /\b(immediate(ly)?|right away)\b/.test(answer)) {
    return reply('immediate', null, false);
  }

  const days = parseDurationDays(answer);
  if (days !== null && categories.has('years') && /\byears?\b/.test(answer)) {
    const years = /(\d+(?:\.\d+)?|[a-z]+)\s+years?/.exec(answer)?.[1] ?? '';
    return reply('years', years ? `${years} years` : null, true);
  }
  if (days !== null && (categories.has('short_notice') || categories.has('long_notice'))) {
    return reply('default', `${days} days`, true);
  }

  const amount = /(\d[\d,.]*\s*(k|lakhs?|thousand|million)?)/.exec(answer)?.[1];
  if (amount && categories.has('hike') && /%|percent/.test(answer)) {
    return reply('hike', amount.trim(), false);
  }
  if (amount && categories.has('amount')) {
    return reply('amount', amount.trim(), true);
  }

  if (categories.has('fresher') && /\b(fresher|no experience|just graduated)\b/.test(answer)) {
    return reply('fresher', null, false);
  }

  return reply('irrelevant', null, true);
}
