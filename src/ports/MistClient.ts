/**
 * Source of per-site adoption configuration. Implementations reject with
 * `FetchError` once their own retry budget is spent.
 */
export interface AdoptionConfigClient {
  fetchAdoptionConfig(orgId: string, siteId: string): Promise<string>;
}
