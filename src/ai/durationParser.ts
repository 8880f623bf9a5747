const UNIT_DAYS = new Map<string, number>(Object.entries({
  day: 1,
  days: 1,
  week: 7,
  weeks: 7,
  month: 30,
  months: 30,
  year: 365,
  years: 365,
}));

const WORD_NUMBERS = new Map<string, number>(Object.entries({
  zero: 0,
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
  fifteen: 15,
  twenty: 20,
  thirty: 30,
  forty: 40,
  fifty: 50,
  sixty: 60,
  ninety: 90,
  couple: 2,
  few: 3,
}));

const IMMEDIATE_PATTERN = /\b(immediate(ly)?|right away|no notice|serving (my )?notice already|already serving)\b/;

/**
 * Parses a spoken duration ("two months", "45 days", "a month and a half")
 * into whole days. Several durations in one answer are added together.
 * Returns 0 for "immediately" style answers and null when nothing parses.
 */
export function parseDurationDays(text: string): number | null {
  const lowered = text.toLowerCase();
  const tokens = lowered.match(/\d+(?:\.\d+)?|[a-z]+/g) ?? [];

  let total = 0;
  let found = false;
  let pending: number | null = null;
  let lastUnitDays = 0;
  let halfAfterUnit = false;

  for (const token of tokens) {
    if (/^\d/.test(token)) {
      pending = Number(token);
      continue;
    }

    const wordValue = WORD_NUMBERS.get(token);
    if (wordValue !== undefined) {
      if (pending !== null && pending >= 20 && pending % 10 === 0 && wordValue < 10) {
        pending += wordValue;
      } else {
        pending = wordValue;
      }
      continue;
    }

    if (token === 'a' || token === 'an') {
      if (pending === null) {
        pending = 1;
      }
      continue;
    }

    if (token === 'half') {
      if (found && pending === 1) {
        halfAfterUnit = true;
        pending = null;
      } else {
        pending = pending === null ? 0.5 : pending + 0.5;
      }
      continue;
    }

    const unitDays = UNIT_DAYS.get(token);
    if (unitDays !== undefined) {
      total += (pending ?? 1) * unitDays;
      found = true;
      lastUnitDays = unitDays;
      pending = null;
      continue;
    }

    if (token !== 'and' && token !== 'of') {
      pending = null;
    }
  }

  if (halfAfterUnit) {
    total += lastUnitDays / 2;
  }

  if (found) {
    return Math.round(total);
  }

  return IMMEDIATE_PATTERN.test(lowered) ? 0 : null;
}
