const SCRIPT_OR_STYLE_TAG_REGEX = /<(script|style)\b[^>]*>[\s\S]*?<\/\1>/gi;
const HTML_TAG_REGEX = /<[^>]+>/g;
const CONTROL_CHARACTER_REGEX = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

export const CONTACT_PLACEHOLDER = '[contact removed]';

// Applied in order; a later pattern sees the output of the earlier ones.
const CONTACT_PATTERNS: readonly RegExp[] = [
  /\b(?:\+?\d{1,3}[-.\s]?)?\(?\d{2,4}\)?[-.\s]?\d{3,4}[-.\s]?\d{3,4}\b/gi,
  /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/gi,
  /\b(?:whatsapp|wa\.me|whats\s*app)\b/gi,
  /\b(?:telegram|t\.me|tg)\b/gi,
  /\b(?:instagram|insta|ig)\s*[:-]?\s*@?\w+\b/gi,
  /@[A-Za-z0-9_]{3,}/g,
  /https?:\/\/[^\s]+/gi,
  /\b\d(?:\s\d){9,}\b/g,
  /\b(?:nine|zero|one|two|three|four|five|six|seven|eight)(?:\s+(?:nine|zero|one|two|three|four|five|six|seven|eight)){6,}\b/gi,
];

export type ContactFilterResult = {
  text: string;
  matches: string[];
};

export function sanitizePlainText(value: unknown, maxLength = 10000): string {
  if (typeof value !== 'string') {
    return '';
  }

  let clean = value
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .replace(SCRIPT_OR_STYLE_TAG_REGEX, ' ')
    .replace(HTML_TAG_REGEX, ' ')
    .replace(CONTROL_CHARACTER_REGEX, '');

  clean = clean
    .split('\n')
    .map((line) => line.replace(/[ \t]{2,}/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();

  if (clean.length > maxLength) {
    clean = clean.slice(0, maxLength).trimEnd();
  }

  return clean;
}

/**
 * Replaces phone numbers, emails, messenger names, social handles and links
 * with a placeholder. Used on free text that is shown to temple staff.
 */
export function filterContactDetails(value: string): ContactFilterResult {
  const matches: string[] = [];
  let text = value;

  CONTACT_PATTERNS.forEach((pattern) => {
    const found = text.match(pattern);
    if (found) {
      matches.push(...found);
      text = text.replace(pattern, CONTACT_PLACEHOLDER);
    }
  });

  return { text, matches };
}

/**
 * Sanitizes optional free text and strips contact details from it.
 * Returns null when nothing is left.
 */
export function sanitizeSharedText(value: unknown, maxLength = 500): string | null {
  const clean = sanitizePlainText(value, maxLength);
  if (!clean) {
    return null;
  }
  return filterContactDetails(clean).text;
}
