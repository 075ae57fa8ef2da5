/**
 * Region listing CSS selectors
 *
 * The listing renders one `.call` block per message inside `#calls`, newest first.
 * Coordinates are attributes on the block itself. The location paragraph holds
 * the street as a bare span followed by links for town, postal code and region.
 * Street and postal code may be missing, so links are told apart by their href
 * rather than their position.
 */

export const SELECTORS = {
  // One block per message
  block: '#calls .call',

  // Header: <h2><a><i class="fa ..."></i> <b>A1</b></a> <span title="zondag 6 april 2025 14:55:01">3 minuten geleden</span></h2>
  priorityCode: 'h2 > a > b',
  time: 'h2 > span',

  // Message body
  description: 'pre',

  // <span><p>capcodes</p><p><span>street</span><a>town</a><a>postal code</a><a>region</a></p></span>
  locationParagraph: 'span > p:nth-child(2)',
  street: 'span',
  locationLink: 'a',
} as const

/**
 * Href shapes of the location links: `/postcode/3511AB/` for the postal code,
 * `/utrecht/` for the region and `/utrecht/zeist/` for the town.
 */
export const LOCATION_LINKS = {
  postalCodePath: '/postcode/',
  regionDepth: 1,
} as const

// Dutch postal code, used when a link carries no href
export const POSTAL_CODE_PATTERN = /^\d{4}\s?[A-Z]{2}$/i

/**
 * Coordinates are read from the block element, the absolute time from the time span.
 */
export const BLOCK_ATTRIBUTES = {
  latitude: 'latitude',
  longitude: 'longitude',
  absoluteTime: 'title',
} as const
