import type { FolderTypeRegistry } from './registry'
import type { Manifest, TypeGroup } from './types'
import { createLogger } from '@sfpack/utils/logger'
import { folderTypeRegistry, resolveTypeName } from './registry'
import { DirectoryScanner, MANIFEST_EXCLUDE_PATTERNS } from './scanner'
import { DEFAULT_API_VERSION, METADATA_NAMESPACE } from './types'

const log = createLogger('build')

export interface ManifestBuilderOptions {
  registry?: FolderTypeRegistry
  scanner?: DirectoryScanner
  /** Default: 31.0 */
  apiVersion?: string
  /** Default: the Salesforce metadata namespace */
  xmlNamespace?: string
}

/**
 * Walks the immediate subfolders of a project root and assembles one TypeGroup per
 * folder. Folder and member order follow the directory listing.
 */
export class ManifestBuilder {
  private readonly registry: FolderTypeRegistry
  private readonly scanner: DirectoryScanner
  private readonly apiVersion: string
  private readonly xmlNamespace: string

  constructor(options: ManifestBuilderOptions = {}) {
    this.registry = options.registry ?? folderTypeRegistry
    this.scanner = options.scanner ?? new DirectoryScanner()
    this.apiVersion = options.apiVersion ?? DEFAULT_API_VERSION
    this.xmlNamespace = options.xmlNamespace ?? METADATA_NAMESPACE
  }

  /**
   * Scan `root` into a frozen Manifest. The first scan failure rejects the whole
   * build.
   */
  async build(root: string): Promise<Manifest> {
    log.start(`Scanning ${root}`)
    const folders = await this.scanner.listSubfolders(root)

    const groups: TypeGroup[] = []
    for (const folder of folders) {
      const members = await this.scanner.listFiles(folder.path, {
        exclude: MANIFEST_EXCLUDE_PATTERNS,
        recursive: false,
      })
      const { typeName, mapped } = resolveTypeName(this.registry, folder.name)
      if (!mapped)
        log.warn(`No metadata type for folder "${folder.name}", using the folder name`)

      groups.push(Object.freeze({
        folder: folder.name,
        typeName,
        mapped,
        members: Object.freeze(members),
      }))
    }

    return Object.freeze({
      groups: Object.freeze(groups),
      apiVersion: this.apiVersion,
      xmlNamespace: this.xmlNamespace,
    })
  }
}

export function countMembers(manifest: Manifest): number {
  return manifest.groups.reduce((sum, group) => sum + group.members.length, 0)
}
