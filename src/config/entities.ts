// SPDX-License-Identifier: Apache-2.0
import type { EntityDescriptor } from '../types/dashboard'

export class RegistryConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'RegistryConfigurationError'
  }
}

export type EntityRegistry = {
  listEntities: () => ReadonlyArray<EntityDescriptor>
  findEntity: (code: string) => EntityDescriptor | null
  size: number
}

export function createEntityRegistry(descriptors: ReadonlyArray<EntityDescriptor>): EntityRegistry {
  const byCode = new Map<string, EntityDescriptor>()
  descriptors.forEach((descriptor, index) => {
    const code = descriptor.code.trim()
    if (!code) throw new RegistryConfigurationError(`Entity at index ${index} is missing a code`)
    if (byCode.has(code)) throw new RegistryConfigurationError(`Duplicate entity code "${code}"`)
    byCode.set(code, Object.freeze({ ...descriptor, code }))
  })
  const ordered = Object.freeze([...byCode.values()])
  return Object.freeze({
    listEntities: () => ordered,
    findEntity: (code: string) => byCode.get(code) ?? null,
    size: ordered.length,
  })
}

// Declaration order is rendering order.
export const ENTITY_REGISTRY = createEntityRegistry([
  { code: 'AFK', displayName: 'Afro Farm Kenya', color: '#00FF94', icon: '🌾', glowColor: '#00FF9455', location: 'Kenya', regulated: false },
  { code: 'GAKP', displayName: 'GAK Properties', color: '#FF0055', icon: '🏢', glowColor: '#FF005555', location: 'USA', regulated: false },
  { code: 'GIFP', displayName: 'GIF Properties', color: '#FFD700', icon: '🏠', glowColor: '#FFD70055', location: 'USA', regulated: false },
  { code: 'COMF', displayName: 'Comfort Services', color: '#00B8FF', icon: '💊', glowColor: '#00B8FF55', location: 'USA', regulated: true },
  { code: 'GAKC', displayName: 'GAK Commodities', color: '#9D00FF', icon: '📦', glowColor: '#9D00FF55', location: 'Kenya', regulated: false },
  { code: 'PRSL', displayName: 'Personal', color: '#FF6B35', icon: '👤', glowColor: '#FF6B3555', location: 'USA', regulated: false },
])

export default ENTITY_REGISTRY
