/**
 * Published state
 *
 * Projects coordinator state into what a consumer shows for one region:
 * the sensor state, its attributes, an icon and the diagnostic values.
 */

import type { RegionConfig } from '../config/settings.js'
import type { CoordinatorState, MessageField, MessageRecord, ServiceType } from './types.js'

export type AttributeValue = string | number | boolean | null

export interface PublishedDiagnostics {
  lastUpdateStatus: 'OK' | 'Error'
  lastSuccessfulUpdate: string | null
  consecutiveErrors: number
}

export interface PublishedState {
  instanceName: string
  regionPath: string
  /** Priority code of the current message, null before the first one */
  state: string | null
  attributes: Record<string, AttributeValue>
  icon: string
  diagnostics: PublishedDiagnostics
  /** False while the region's last poll failed */
  available: boolean
}

const SERVICE_ICONS: Record<ServiceType, string> = {
  Ambulance: 'mdi:ambulance',
  Fire: 'mdi:fire-truck',
  Police: 'mdi:police-car',
  Other: 'mdi:alert-circle-outline',
}

export function iconFor(serviceType: ServiceType | undefined): string {
  return SERVICE_ICONS[serviceType ?? 'Other']
}

function toAttributeValue(value: MessageRecord[MessageField]): AttributeValue | undefined {
  if (value === undefined) return undefined
  if (value instanceof Date) return value.toISOString()
  return value
}

/**
 * Record fields listed in `enabledSensors`, in that order. The priority code
 * is the state itself and never repeated as an attribute; absent fields are left out.
 */
export function flattenRecord(
  record: MessageRecord,
  enabledSensors: readonly MessageField[]
): Record<string, AttributeValue> {
  const attributes: Record<string, AttributeValue> = {}

  for (const field of enabledSensors) {
    if (field === 'priorityCode') continue
    const value = toAttributeValue(record[field])
    if (value !== undefined) {
      attributes[field] = value
    }
  }

  return attributes
}

export function toPublishedState(region: RegionConfig, state: Readonly<CoordinatorState>): PublishedState {
  const record = state.lastMessage
  const attributes = record ? flattenRecord(record, region.enabledSensors) : {}

  attributes.matchesFilter = state.matchesFilter
  attributes.lastUpdateAttempt = state.lastUpdateAttempt?.toISOString() ?? null

  return {
    instanceName: region.instanceName,
    regionPath: region.regionPath,
    state: record?.priorityCode ?? null,
    attributes,
    icon: iconFor(record?.serviceType),
    diagnostics: {
      lastUpdateStatus: state.lastUpdateStatus === 'ok' ? 'OK' : 'Error',
      lastSuccessfulUpdate: state.lastSuccessfulUpdate?.toISOString() ?? null,
      consecutiveErrors: state.consecutiveErrors,
    },
    available: state.lastUpdateStatus === 'ok',
  }
}
