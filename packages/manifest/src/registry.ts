import type { FolderTypeEntry } from './types'
import { invalidConfigError } from './errors'

export const DEFAULT_FOLDER_TYPES: readonly FolderTypeEntry[] = Object.freeze([
  { folderName: 'aura', typeName: 'AuraDefinitionBundle' },
  { folderName: 'classes', typeName: 'ApexClass' },
  { folderName: 'components', typeName: 'ApexComponent' },
  { folderName: 'pages', typeName: 'ApexPage' },
  { folderName: 'triggers', typeName: 'ApexTrigger' },
  { folderName: 'staticresources', typeName: 'StaticResource' },
  { folderName: 'objects', typeName: 'CustomObject' },
  { folderName: 'profiles', typeName: 'Profile' },
])

export interface FolderTypeRegistry {
  /** Type name for a folder, or undefined when the folder is not in the table */
  lookup: (folderName: string) => string | undefined
  entries: () => readonly FolderTypeEntry[]
}

export interface ResolvedType {
  typeName: string
  mapped: boolean
}

/**
 * Build an immutable registry. Keys compare case-insensitively, so `Classes`
 * and `classes` collide.
 */
export function createFolderTypeRegistry(entries: readonly FolderTypeEntry[]): FolderTypeRegistry {
  const table = new Map<string, string>()
  for (const entry of entries) {
    const key = entry.folderName.toLowerCase()
    if (table.has(key))
      throw invalidConfigError(`duplicate folder mapping "${entry.folderName}"`)
    table.set(key, entry.typeName)
  }
  const frozen = Object.freeze(entries.map(entry => Object.freeze({ ...entry })))

  return {
    lookup: folderName => table.get(folderName.toLowerCase()),
    entries: () => frozen,
  }
}

export const folderTypeRegistry: FolderTypeRegistry = createFolderTypeRegistry(DEFAULT_FOLDER_TYPES)

/**
 * Resolve the manifest type for a folder. Unmapped folders fall back to their
 * raw name with `mapped: false`.
 */
export function resolveTypeName(registry: FolderTypeRegistry, folderName: string): ResolvedType {
  const typeName = registry.lookup(folderName)
  if (typeName === undefined)
    return { typeName: folderName, mapped: false }
  return { typeName, mapped: true }
}
