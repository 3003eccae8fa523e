/**
 * TextNormalizer - whitespace handling for Markdown output
 */
export class TextNormalizer {
  /**
   * Collapse all whitespace (including line breaks and non-breaking spaces)
   * into single spaces and trim.
   */
  static toSingleLine(text: string): string {
    if (!text) return '';

    return text
      .normalize('NFC')
      .replace(/[\t\u00A0\u2000-\u200B]/g, ' ')
      .replace(/\s+/g, ' ')
      .trim();
  }

  /**
   * Trim each line, drop blank lines and rejoin with `\n`.
   * Returns '' for whitespace-only input.
   */
  static toParagraph(text: string): string {
    if (!text) return '';

    return text
      .normalize('NFC')
      .split(/\r\n|\r|\n/)
      .map((line) => line.replace(/[\t\u00A0\u2000-\u200B]/g, ' ').trim())
      .filter((line) => line.length > 0)
      .join('\n');
  }

  static isBlank(text: string): boolean {
    return text.trim().length === 0;
  }
}
