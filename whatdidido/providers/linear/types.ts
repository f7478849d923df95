/**
 * Linear provider configuration and API types
 */

import { z } from 'zod';

export const LINEAR_API_KEY = 'LINEAR_API_KEY';

export const LINEAR_GRAPHQL_ENDPOINT = 'https://api.linear.app/graphql';

export interface LinearConfig {
  /** Personal API key, sent as-is in the Authorization header */
  apiKey: string;
}

export const VIEWER_QUERY = `
query {
  viewer {
    id
    name
    email
  }
}
`;

export const LinearViewerResponseSchema = z.object({
  data: z
    .object({
      viewer: z.object({
        id: z.string(),
        name: z.string(),
        email: z.string().nullable().optional(),
      }),
    })
    .nullable()
    .optional(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});
