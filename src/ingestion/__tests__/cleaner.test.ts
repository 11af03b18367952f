import { describe, expect, it } from 'vitest';
import { TextCleaner } from '../cleaner';

describe('TextCleaner', () => {
  const cleaner = new TextCleaner();

  it('turns paragraphs into blank lines and strips tags', () => {
    expect(cleaner.clean('First point<p>Second <i>point</i>')).toBe('First point\n\nSecond point');
  });

  it('decodes common HTML entities', () => {
    expect(cleaner.clean('It&#x27;s &quot;fine&quot; &amp; cheap')).toBe('It\'s "fine" & cheap');
  });

  it('drops script blocks', () => {
    expect(cleaner.clean('Hello<script>alert(1)</script> world')).toBe('Hello world');
  });
});
