/**
 * OpenAI service integration configuration and API types
 */

import { z } from 'zod';

export const OPENAI_API_KEY = 'OPENAI_API_KEY';
export const OPENAI_BASE_URL = 'OPENAI_BASE_URL';
export const OPENAI_WORKITEM_SUMMARY_MODEL = 'OPENAI_WORKITEM_SUMMARY_MODEL';
export const OPENAI_SUMMARY_MODEL = 'OPENAI_SUMMARY_MODEL';

export const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_WORKITEM_SUMMARY_MODEL = 'gpt-4o-mini';
export const DEFAULT_SUMMARY_MODEL = 'gpt-5';

export interface OpenAIConfig {
  apiKey: string;
  /** API root; override for Azure OpenAI or a compatible gateway */
  baseUrl: string;
  /** Model used per work item */
  workItemSummaryModel: string;
  /** Model used for the overall summary */
  summaryModel: string;
}

export const OpenAIModelListSchema = z.object({
  data: z.array(z.object({ id: z.string() })),
});
