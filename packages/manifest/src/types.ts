/** One row of the folder-to-type table */
export interface FolderTypeEntry {
  readonly folderName: string
  readonly typeName: string
}

/** An immediate child directory of the scanned root */
export interface FolderHandle {
  /** Directory name as listed */
  name: string
  /** Absolute path */
  path: string
}

/**
 * One scanned subfolder: a type label plus the base names found inside it.
 * Members keep directory-listing order and may repeat.
 */
export interface TypeGroup {
  readonly folder: string
  readonly typeName: string
  /** False when the folder is missing from the registry and its raw name is used */
  readonly mapped: boolean
  readonly members: readonly string[]
}

export interface Manifest {
  readonly groups: readonly TypeGroup[]
  readonly apiVersion: string
  readonly xmlNamespace: string
}

export const DEFAULT_API_VERSION = '31.0'
export const DEFAULT_PACKAGE_NAME = 'package.xml'
export const METADATA_NAMESPACE = 'http://soap.sforce.com/2006/04/metadata'
