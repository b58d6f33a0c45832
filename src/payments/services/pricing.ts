/** Price of a fresh question, before adjustments */
export const BASE_POINTS = 6;
export const MIN_POINTS = 5;
export const MAX_POINTS = 10;
/** Questions longer than this cost more */
export const LONG_QUESTION_CHARS = 120;

export const TECHNICAL_KEYWORDS = [
  'matrix',
  'gaussian',
  'proof',
  'opencv',
  'unreal',
  'swiftui',
  'jetson',
  'agent',
] as const;

/**
 * Points to charge for a question, clamped to [MIN_POINTS, MAX_POINTS].
 *
 * `seenBefore` grants a discount, but the quote flow bills a question only
 * once and always passes false.
 */
export function decidePoints(question: string, seenBefore: boolean): number {
  let points = BASE_POINTS;
  // counted in code points
  if ([...question].length > LONG_QUESTION_CHARS) points += 2;

  const lower = question.toLowerCase();
  if (TECHNICAL_KEYWORDS.some(keyword => lower.includes(keyword))) points += 2;

  if (seenBefore) points -= 2;
  return Math.max(MIN_POINTS, Math.min(MAX_POINTS, points));
}
