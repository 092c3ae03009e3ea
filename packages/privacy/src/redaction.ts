/**
 * Deterministic identifier scrub
 *
 * Runs after model-based redaction and replaces any identifier the model left
 * behind with a typed placeholder.
 */

export interface RedactionReport {
  patternsMatched: string[];
  replacements: number;
}

interface IdentifierPattern {
  name: string;
  pattern: RegExp;
  placeholder: string;
}

/**
 * Applied in order; earlier patterns take precedence over later, looser ones
 */
const IDENTIFIER_PATTERNS: IdentifierPattern[] = [
  {
    name: 'email',
    pattern: /\b[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}\b/g,
    placeholder: '[EMAIL]',
  },
  {
    name: 'ni_number',
    pattern: /\b[A-CEGHJ-PR-TW-Z]{2}\s?\d{2}\s?\d{2}\s?\d{2}\s?[A-D]\b/gi,
    placeholder: '[NI_NUMBER]',
  },
  {
    name: 'phone',
    pattern: /(?:\+44\s?\d{2,4}|\b0\d{2,4})[\s-]?\d{3,4}[\s-]?\d{3,4}\b/g,
    placeholder: '[PHONE]',
  },
  {
    name: 'postcode',
    pattern: /\b[A-Z]{1,2}\d[A-Z\d]?\s*\d[A-Z]{2}\b/g,
    placeholder: '[POSTCODE]',
  },
];

export function scrubIdentifiers(text: string): { redactedText: string; report: RedactionReport } {
  let redactedText = text;
  const patternsMatched: string[] = [];
  let replacements = 0;

  for (const { name, pattern, placeholder } of IDENTIFIER_PATTERNS) {
    const matches = redactedText.match(pattern);
    if (matches) {
      patternsMatched.push(name);
      replacements += matches.length;
      redactedText = redactedText.replace(pattern, placeholder);
    }
  }

  return { redactedText, report: { patternsMatched, replacements } };
}
