/**
 * GitHub provider configuration and API types
 */

import { z } from 'zod';

export const GITHUB_TOKEN = 'GITHUB_TOKEN';
export const GITHUB_API_URL = 'GITHUB_API_URL';

export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';

/**
 * GitHub account configuration
 */
export interface GitHubConfig {
  /** Personal access token */
  token: string;
  /** REST root; https://api.github.com or https://HOST/api for Enterprise Server */
  apiUrl: string;
}

export const GitHubViewerResponseSchema = z.object({
  data: z
    .object({
      viewer: z.object({
        login: z.string(),
        name: z.string().nullable(),
      }),
    })
    .nullable()
    .optional(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});

export type GitHubViewerResponse = z.infer<typeof GitHubViewerResponseSchema>;
