/**
 * Inline formatting: converts rich-text arrays into Markdown.
 */
import { getArray, getBoolean, getOptionalString, getRecord, getString, isRecord } from '../utils/records.js';
import type { TextSpan } from './types.js';

/**
 * Parse a rich-text array into spans. Entries that are not objects are dropped.
 */
export function toSpans(value: unknown): TextSpan[] {
  if (!Array.isArray(value)) return [];
  const spans: TextSpan[] = [];
  for (const item of value) {
    if (!isRecord(item)) continue;
    const annotations = getRecord(item, 'annotations');
    spans.push({
      text: getString(item, 'plain_text'),
      href: getOptionalString(item, 'href'),
      bold: getBoolean(annotations, 'bold'),
      italic: getBoolean(annotations, 'italic'),
      strikethrough: getBoolean(annotations, 'strikethrough'),
      underline: getBoolean(annotations, 'underline'),
      code: getBoolean(annotations, 'code'),
    });
  }
  return spans;
}

/**
 * Apply a span's styles in a fixed order: code, bold, italic,
 * strikethrough, underline, then the link.
 */
export function formatSpan(span: TextSpan): string {
  let content = span.text;
  if (span.code) content = `\`${content}\``;
  if (span.bold) content = `**${content}**`;
  if (span.italic) content = `*${content}*`;
  if (span.strikethrough) content = `~~${content}~~`;
  // Markdown has no underline
  if (span.underline) content = `<u>${content}</u>`;
  if (span.href) content = `[${content}](${span.href})`;
  return content;
}

export function formatRichText(value: unknown): string {
  return toSpans(value).map(formatSpan).join('');
}

/**
 * Format the rich-text array stored under `key` in a block payload.
 */
export function richText(content: Record<string, unknown>, key = 'rich_text'): string {
  return formatRichText(getArray(content, key));
}
