// SPDX-License-Identifier: Apache-2.0
import type { EntityDescriptor, EntityTabKey } from '../types/dashboard'
import type { EntityRegistry } from './entities'

export type EntityTabConfig = {
  key: EntityTabKey
  label: string
  title: string
  members: ReadonlyArray<{ code: string; caption: string }>
}

export type EntityTabMember = { entity: EntityDescriptor; caption: string }

export const ENTITY_TABS: ReadonlyArray<EntityTabConfig> = [
  { key: 'farm', label: '🌾 AFK Farm', title: 'Farm Operations', members: [{ code: 'AFK', caption: 'Farm Operations' }] },
  {
    key: 'properties',
    label: '🏢 Properties',
    title: 'Property Portfolio',
    members: [
      { code: 'GAKP', caption: 'Property Management' },
      { code: 'GIFP', caption: 'Property Management' },
      { code: 'GAKC', caption: 'Property Holdings' },
    ],
  },
  {
    key: 'healthcare',
    label: '💊 Healthcare',
    title: 'Healthcare Services',
    members: [{ code: 'COMF', caption: 'Healthcare Services' }],
  },
]

export function findEntityTab(key: string): EntityTabConfig | null {
  return ENTITY_TABS.find((tab) => tab.key === key) ?? null
}

/** Members in tab order; codes the registry does not know are skipped. */
export function resolveEntityTab(registry: EntityRegistry, tab: EntityTabConfig): EntityTabMember[] {
  return tab.members.flatMap(({ code, caption }) => {
    const entity = registry.findEntity(code)
    return entity ? [{ entity, caption: `${entity.location} | ${caption}` }] : []
  })
}
