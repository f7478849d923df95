/**
 * Jira provider configuration and API types
 */

import { z } from 'zod';

export const JIRA_URL = 'JIRA_URL';
export const JIRA_USERNAME = 'JIRA_USERNAME';
export const JIRA_API_KEY = 'JIRA_API_KEY';

/**
 * Jira account configuration
 */
export interface JiraConfig {
  /** Site URL without trailing slash, e.g. https://your-domain.atlassian.net */
  url: string;
  /** Account email (Cloud) or username (Server / Data Center) */
  username: string;
  /** API token used as the Basic auth password */
  apiKey: string;
}

/**
 * Minimal fields from GET /rest/api/2/myself.
 * Cloud returns accountId, Server returns name/key instead.
 */
export const JiraMyselfSchema = z.object({
  accountId: z.string().optional(),
  name: z.string().optional(),
  key: z.string().optional(),
  displayName: z.string(),
  emailAddress: z.string().optional(),
  active: z.boolean().optional(),
});

export type JiraMyself = z.infer<typeof JiraMyselfSchema>;
