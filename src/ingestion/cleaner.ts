/**
 * Text Cleaner
 *
 * Turns connector payloads (HTML comment bodies, escaped entities) into
 * plain text before they are ingested.
 */

const HTML_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&#x27;': "'",
  '&#x2F;': '/',
  '&nbsp;': ' ',
};

export class TextCleaner {
  clean(rawText: string): string {
    let cleaned = rawText;

    // Paragraph tags become blank lines so sentences stay apart
    cleaned = cleaned.replace(/<p>/gi, '\n\n');
    cleaned = this.removeHtml(cleaned);
    cleaned = this.decodeHtmlEntities(cleaned);
    cleaned = this.normalizeWhitespace(cleaned);

    return cleaned.trim();
  }

  private removeHtml(text: string): string {
    text = text.replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, '');
    text = text.replace(/<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi, '');
    return text.replace(/<[^>]+>/g, ' ');
  }

  private decodeHtmlEntities(text: string): string {
    return text.replace(/&[#a-z0-9]+;/gi, (entity) => HTML_ENTITIES[entity] ?? entity);
  }

  private normalizeWhitespace(text: string): string {
    text = text.replace(/[ \t]+/g, ' ');
    text = text.replace(/^ +| +$/gm, '');
    return text.replace(/\n{3,}/g, '\n\n');
  }
}
