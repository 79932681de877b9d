/**
 * Text Processor Tests
 */

import { TextProcessor } from '../text.processor';

describe('TextProcessor', () => {
  let textProcessor: TextProcessor;

  beforeEach(() => {
    textProcessor = new TextProcessor();
  });

  describe('process', () => {
    it('should keep paragraph breaks and collapse other whitespace', () => {
      const text = '  First   line  \n\n\n\n  Second\tparagraph  ';
      const result = textProcessor.process(text);

      expect(result.text).toBe('First line\n\nSecond paragraph');
      expect(result.originalLength).toBe(text.length);
      expect(result.processedLength).toBe(result.text.length);
      expect(result.metadata.normalized).toBe(true);
    });

    it('should flatten everything to one line when paragraphs are not preserved', () => {
      const result = textProcessor.process('One\n\nTwo\nThree', { preserveParagraphs: false });
      expect(result.text).toBe('One Two Three');
    });

    it('should remove control and zero-width characters', () => {
      const result = textProcessor.process('Test\u0000\u0001Text\u200B!');
      expect(result.text).toBe('TestText!');
    });

    it('should normalize line breaks', () => {
      const result = textProcessor.process('Line1\r\nLine2\rLine3');
      expect(result.text).toBe('Line1\nLine2\nLine3');
    });

    it('should compose Unicode to NFC', () => {
      const result = textProcessor.process('cafe\u0301');
      expect(result.text).toBe('caf\u00E9');
    });

    it('should turn non-breaking and ideographic spaces into plain spaces', () => {
      const result = textProcessor.process('施政\u3000報告\u00A0two');
      expect(result.text).toBe('施政 報告 two');
    });

    it('should handle empty and whitespace-only text', () => {
      expect(textProcessor.process('').text).toBe('');
      const blank = textProcessor.process('   \n\t  ');
      expect(blank.text).toBe('');
      expect(blank.metadata.removedChars).toBe(7);
    });
  });

  describe('cleanWhitespace', () => {
    it('should collapse all whitespace runs', () => {
      expect(textProcessor.cleanWhitespace('  a \n\n b\tc ')).toBe('a b c');
    });
  });
});
