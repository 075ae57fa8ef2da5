/**
 * Service-type classification
 *
 * Case-insensitive substring match of the message text against one keyword
 * group per service. Groups are checked in SERVICE_TYPE_PRIORITY order
 * (Ambulance, Fire, Police) and the first group with a hit decides, so a
 * message mentioning both "brand" and "politie" is Fire. No hit means Other.
 *
 * Adding a service means adding a group here and a value to ServiceType.
 */

import type { ServiceType } from './types.js'

export interface KeywordGroup {
  serviceType: Exclude<ServiceType, 'Other'>
  keywords: readonly string[]
}

export const KEYWORD_GROUPS: readonly KeywordGroup[] = [
  {
    serviceType: 'Ambulance',
    keywords: ['ambulance', 'ambu', 'mmt', 'traumaheli', 'lifeliner', 'reanimatie'],
  },
  {
    serviceType: 'Fire',
    keywords: ['brand', 'brw', 'rookmelder', 'gaslek', 'hulpverlening'],
  },
  {
    serviceType: 'Police',
    keywords: ['politie', 'inbraak', 'overval', 'achtervolging'],
  },
]

export function classify(text: string): ServiceType {
  const haystack = text.toLowerCase()

  for (const group of KEYWORD_GROUPS) {
    if (group.keywords.some((keyword) => haystack.includes(keyword))) {
      return group.serviceType
    }
  }

  return 'Other'
}
