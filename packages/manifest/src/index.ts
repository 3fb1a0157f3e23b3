export { countMembers, ManifestBuilder } from './builder'
export type { ManifestBuilderOptions } from './builder'

export {
  invalidConfigError,
  ioError,
  isManifestError,
  ManifestError,
  ManifestErrorCode,
  notFoundError,
  scanError,
} from './errors'

export {
  createFolderTypeRegistry,
  DEFAULT_FOLDER_TYPES,
  folderTypeRegistry,
  resolveTypeName,
} from './registry'
export type { FolderTypeRegistry, ResolvedType } from './registry'

export {
  DirectoryScanner,
  LISTING_EXCLUDE_PATTERNS,
  MANIFEST_EXCLUDE_PATTERNS,
  NodeDirectoryReader,
  stripExtension,
} from './scanner'
export type { DirectoryEntry, DirectoryReader, ListFilesOptions } from './scanner'

export { DEFAULT_API_VERSION, DEFAULT_PACKAGE_NAME, METADATA_NAMESPACE } from './types'
export type { FolderHandle, FolderTypeEntry, Manifest, TypeGroup } from './types'

export { renderManifest, renderMemberListing, writeManifest } from './writer'
