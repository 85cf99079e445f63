// packages/core/src/prompts/analysis.ts

/**
 * The seven sections every analysis must contain, in order.
 */
export const ANALYSIS_SECTIONS = [
  { heading: 'DOCUMENT TYPE', ask: 'What kind of document is this?' },
  { heading: 'SUMMARY', ask: 'A brief 2-3 sentence summary' },
  { heading: 'KEY POINTS', ask: 'Main topics (bullet points)' },
  { heading: 'ACTION ITEMS', ask: 'Any tasks or actions (with owners if specified)' },
  { heading: 'IMPORTANT DATES', ask: 'Any dates or deadlines' },
  { heading: 'RISKS/CONCERNS', ask: 'Any issues or problems' },
  { heading: 'NUMBERS/METRICS', ask: 'Important statistics or data' },
] as const;

/** Everything after this line in the prompt is document text. */
export const DOCUMENT_CONTENT_LABEL = 'DOCUMENT CONTENT:';

export interface TruncatedText {
  text: string;
  truncated: boolean;
  originalLength: number;
}

/**
 * Keep the first `maxChars` characters and append `marker` when the text is
 * longer. Shorter text passes through untouched.
 */
export function truncateDocument(text: string, maxChars: number, marker: string): TruncatedText {
  if (text.length <= maxChars) {
    return { text, truncated: false, originalLength: text.length };
  }
  return { text: text.slice(0, maxChars) + marker, truncated: true, originalLength: text.length };
}

export function buildAnalysisPrompt(documentText: string): string {
  return [
    'Analyze the following document and extract:',
    '',
    ...ANALYSIS_SECTIONS.flatMap((section, i) => [`${i + 1}. ${section.heading}: ${section.ask}`, '']),
    'Format your response clearly with these headers.',
    '',
    DOCUMENT_CONTENT_LABEL,
    documentText,
  ].join('\n');
}
