/**
 * Region URL helpers
 *
 * A region path is the site-relative slug of a region listing, e.g.
 * "utrecht" or "amsterdam-amstelland/amsterdam". Users paste it with or
 * without surrounding slashes; the request URL always ends in a slash.
 */

/**
 * Trim whitespace and surrounding slashes. Returns '' for a blank path.
 */
export function normalizeRegionPath(regionPath: string): string {
  return regionPath.trim().replace(/^\/+|\/+$/g, '')
}

/**
 * Build the listing URL for a region.
 *
 * @throws Error if the region path is blank
 */
export function buildRegionUrl(baseUrl: string, regionPath: string): string {
  const path = normalizeRegionPath(regionPath)
  if (!path) {
    throw new Error('Region path must not be empty')
  }

  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`
  return `${base}${path}/`
}
