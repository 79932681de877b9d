/**
 * Text Processor
 * Unicode normalization and whitespace cleanup for extracted page text
 */

export type UnicodeNormalizationForm = 'NFC' | 'NFD' | 'NFKC' | 'NFKD';

export interface TextProcessorConfig {
  normalizeUnicode?: boolean;
  normalizeForm?: UnicodeNormalizationForm;
  cleanWhitespace?: boolean;
  removeControlChars?: boolean;
  normalizeLineBreaks?: boolean;
  trimLines?: boolean;
  preserveParagraphs?: boolean;
}

export interface ProcessedText {
  text: string;
  originalLength: number;
  processedLength: number;
  metadata: {
    removedChars: number;
    normalized: boolean;
  };
}

export class TextProcessor {
  private config: Required<TextProcessorConfig>;

  constructor(config?: TextProcessorConfig) {
    this.config = {
      normalizeUnicode: config?.normalizeUnicode !== false,
      normalizeForm: config?.normalizeForm || 'NFC',
      cleanWhitespace: config?.cleanWhitespace !== false,
      removeControlChars: config?.removeControlChars !== false,
      normalizeLineBreaks: config?.normalizeLineBreaks !== false,
      trimLines: config?.trimLines !== false,
      preserveParagraphs: config?.preserveParagraphs !== false,
    };
  }

  /**
   * Main processing method
   */
  process(text: string, options?: Partial<TextProcessorConfig>): ProcessedText {
    if (!text || text.trim().length === 0) {
      return {
        text: '',
        originalLength: text ? text.length : 0,
        processedLength: 0,
        metadata: {
          removedChars: text ? text.length : 0,
          normalized: false,
        },
      };
    }

    const originalLength = text.length;
    const config = { ...this.config, ...options };
    let processed = text;
    let normalized = false;

    if (config.normalizeUnicode) {
      processed = processed.normalize(config.normalizeForm);
      normalized = true;
    }

    if (config.removeControlChars) {
      processed = this.removeControlCharacters(processed);
    }

    if (config.normalizeLineBreaks) {
      processed = this.normalizeLineBreaks(processed);
    }

    if (config.trimLines) {
      processed = this.trimLines(processed);
    }

    if (config.cleanWhitespace) {
      processed = config.preserveParagraphs
        ? this.cleanWhitespacePreserveParagraphs(processed)
        : this.cleanWhitespace(processed);
    }

    return {
      text: processed,
      originalLength,
      processedLength: processed.length,
      metadata: {
        removedChars: Math.max(0, originalLength - processed.length),
        normalized,
      },
    };
  }

  /**
   * Clean whitespace (aggressive)
   */
  cleanWhitespace(text: string): string {
    return text
      .replace(/\s+/g, ' ') // Replace all whitespace with single space
      .trim();
  }

  /**
   * Clean whitespace while preserving paragraphs
   */
  cleanWhitespacePreserveParagraphs(text: string): string {
    return text
      .replace(/[ \t\u00A0\u3000]+/g, ' ') // Replace spaces/tabs with single space
      .replace(/[ \t]+\n/g, '\n') // Remove trailing spaces before newlines
      .replace(/\n[ \t]+/g, '\n') // Remove leading spaces after newlines
      .replace(/\n{3,}/g, '\n\n') // Max 2 consecutive newlines
      .trim();
  }

  /**
   * Normalize line breaks
   */
  normalizeLineBreaks(text: string): string {
    return text
      .replace(/\r\n/g, '\n') // CRLF → LF
      .replace(/\r/g, '\n'); // CR → LF
  }

  /**
   * Remove control characters
   */
  removeControlCharacters(text: string): string {
    return text
      // ASCII control characters except tab, newline and carriage return
      .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
      // Zero-width characters
      .replace(/[\u200B-\u200D\uFEFF]/g, '')
      // Bidirectional control characters
      .replace(/[\u202A-\u202E\u2066-\u2069]/g, '');
  }

  /**
   * Trim whitespace from each line
   */
  trimLines(text: string): string {
    return text
      .split('\n')
      .map((line) => line.trim())
      .join('\n');
  }
}

// Export singleton instance with default configuration
export const textProcessor = new TextProcessor();
