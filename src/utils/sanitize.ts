/**
 * Input sanitization for user questions and log lines.
 */

/**
 * Inputs longer than this skip the injection regexes (ReDoS guard)
 */
const MAX_REGEX_INPUT_LENGTH = 10000;

export const MAX_QUESTION_LENGTH = 1000;

// Patterns are kept simple to avoid catastrophic backtracking
const PROMPT_INJECTION_PATTERNS = [
  /ignore\s+(all\s+)?(previous|above|prior)\s+(instructions?|prompts?|rules?)/i,
  /disregard\s+(all\s+)?(previous|above|prior)/i,
  /forget\s+(all\s+)?(previous|above|prior)/i,
  /you\s+are\s+now\s+/i,
  /new\s+instructions?:/i,
  /\[\s*\/?INST\s*\]/i,
  /<\|im_(start|end)\|>/i,
  /<<\/?SYS>>/i,
];

const LOG_DANGEROUS_CHARS = /[\r\n\x00-\x08\x0b\x0c\x0e-\x1f]/g;

/**
 * Sanitize input for use in LLM prompts
 * Returns the sanitized text and whether injection-like patterns were seen
 */
export function sanitizeForLLM(input: string): { sanitized: string; suspicious: boolean } {
  if (!input) {
    return { sanitized: '', suspicious: false };
  }

  if (input.length > MAX_REGEX_INPUT_LENGTH) {
    return { sanitized: input.substring(0, MAX_QUESTION_LENGTH), suspicious: true };
  }

  const suspicious = PROMPT_INJECTION_PATTERNS.some(pattern => pattern.test(input));

  const sanitized = input
    .replace(/\[\s*(system|user|assistant)\s*\]/gi, '')
    .replace(/\0/g, '')
    .replace(/\s+/g, ' ')
    .trim();

  return { sanitized, suspicious };
}

/**
 * Sanitize input for safe single-line logging
 */
export function sanitizeForLog(input: string): string {
  if (!input) {
    return '';
  }

  return input
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(LOG_DANGEROUS_CHARS, '')
    .substring(0, 1000);
}

export function validateUserQuestion(input: string): {
  valid: boolean;
  sanitized: string;
  error?: string;
} {
  const trimmed = input.trim();

  if (trimmed.length === 0) {
    return { valid: false, sanitized: '', error: 'Query cannot be empty' };
  }

  if (trimmed.length > MAX_QUESTION_LENGTH) {
    return { valid: false, sanitized: '', error: `Query too long (max ${MAX_QUESTION_LENGTH} characters)` };
  }

  const { sanitized, suspicious } = sanitizeForLLM(trimmed);

  return {
    valid: true,
    sanitized,
    error: suspicious ? 'Input contained suspicious patterns that were sanitized' : undefined,
  };
}
