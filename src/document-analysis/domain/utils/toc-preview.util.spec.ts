import { buildTocPreview } from './toc-preview.util';

describe('buildTocPreview', () => {
  const page = [
    'Contents',
    '1. Introduction ..... 3',
    'Some body text here',
    'Chapter 2 Methods',
  ].join('\n');

  it('should keep outline-like lines only', () => {
    expect(buildTocPreview([page], 1500)).toBe(
      'Contents\n1. Introduction ..... 3\nChapter 2 Methods',
    );
  });

  it('should drop duplicates across pages', () => {
    expect(buildTocPreview([page, 'Chapter 2 Methods'], 1500)).toBe(
      'Contents\n1. Introduction ..... 3\nChapter 2 Methods',
    );
  });

  it('should recognise Russian headings', () => {
    expect(buildTocPreview(['Содержание\nГлава 1 Основы'], 1500)).toBe(
      'Содержание\nГлава 1 Основы',
    );
  });

  it('should truncate to maxChars', () => {
    expect(buildTocPreview([page], 10)).toBe('Contents\n1');
  });

  it('should return null when nothing looks like an outline', () => {
    expect(buildTocPreview(['just a paragraph of prose'], 1500)).toBeNull();
  });
});
