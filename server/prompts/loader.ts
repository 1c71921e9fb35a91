import { PROMPT_TEMPLATES } from '../../shared/prompts';
import type { SummaryLanguage } from '../../shared/types';

export const loadPrompt = (filename: string): string => {
  const content = PROMPT_TEMPLATES[filename];
  if (!content) {
    throw new Error(`Missing prompt template: ${filename}`);
  }
  return content;
};

export const buildSummaryPrompt = (articleText: string, language: SummaryLanguage): string =>
  loadPrompt(`summarize_${language}.md`).replace('{ARTICLE_TEXT}', () => articleText);
