/**
 * GitHub GraphQL queries
 */

/**
 * Identity of the token's owner; the cheapest query that proves a token works
 */
export const VIEWER_QUERY = `
query GetViewer {
  viewer {
    login
    name
  }
}
`;
