import { describe, expect, it } from 'vitest';
import { classifyDifficulty, technicalDensity } from '../difficulty';

const settings = { technicalTerms: ['transformer', '量子'], mediumDensity: 1, highDensity: 3 };

describe('technicalDensity', () => {
  it('counts term hits per 100 words', () => {
    expect(technicalDensity('The Transformer model uses a transformer block', settings.technicalTerms)).toBe(
      (2 / 7) * 100,
    );
    expect(technicalDensity('', settings.technicalTerms)).toBe(0);
  });
});

describe('classifyDifficulty', () => {
  it('grades by density thresholds', () => {
    const filler = Array.from({ length: 99 }, () => 'word').join(' ');
    expect(classifyDifficulty(`${filler} plain`, settings)).toBe('low');
    expect(classifyDifficulty(`${filler} transformer`, settings)).toBe('medium');
    expect(classifyDifficulty('transformer 量子 transformer', settings)).toBe('high');
  });

  it('weights unspaced Japanese text by character count', () => {
    const terms = { ...settings, technicalTerms: ['理論'] };
    const report = '研究者が新たな結果を報告した。'.repeat(10);
    expect(technicalDensity(`${report}その理論は注目を集めた。`, terms.technicalTerms)).toBe((1 / 75.5) * 100);
    expect(classifyDifficulty(`${report}その理論は注目を集めた。`, terms)).toBe('medium');
    expect(classifyDifficulty(report, terms)).toBe('low');
  });
});
