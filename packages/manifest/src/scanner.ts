import type { FolderHandle } from './types'
import { readdir, stat } from 'node:fs/promises'
import path from 'node:path'
import { matchesAny } from '@sfpack/utils/glob'
import { createLogger } from '@sfpack/utils/logger'
import { notFoundError, scanError } from './errors'

const log = createLogger('scan')

/** Entries excluded from each folder when building the full manifest */
export const MANIFEST_EXCLUDE_PATTERNS: readonly string[] = Object.freeze(['*.txt', '*.log', '*.xml'])

/**
 * Entries excluded from a single-directory listing. Empty: the listing keeps
 * `.txt`, `.log` and `.xml` entries that the manifest drops.
 */
export const LISTING_EXCLUDE_PATTERNS: readonly string[] = Object.freeze([])

export interface DirectoryEntry {
  name: string
  isDirectory: boolean
}

/**
 * File-system seam for the scanner. Entries come back in the order the
 * implementation lists them; the scanner never reorders.
 */
export interface DirectoryReader {
  /** Whether `target` exists and is a directory; rejects only on unexpected failures */
  isDirectory: (target: string) => Promise<boolean>
  readEntries: (dir: string) => Promise<DirectoryEntry[]>
}

export class NodeDirectoryReader implements DirectoryReader {
  async isDirectory(target: string): Promise<boolean> {
    try {
      const stats = await stat(target)
      return stats.isDirectory()
    }
    catch (error) {
      if (isMissingPathError(error))
        return false
      throw error
    }
  }

  async readEntries(dir: string): Promise<DirectoryEntry[]> {
    const dirents = await readdir(dir, { withFileTypes: true })
    return dirents.map(dirent => ({ name: dirent.name, isDirectory: dirent.isDirectory() }))
  }
}

function isMissingPathError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error))
    return false
  return error.code === 'ENOENT' || error.code === 'ENOTDIR'
}

export interface ListFilesOptions {
  /** Glob patterns matched against each entry name */
  exclude?: readonly string[]
  /** Descend into subdirectories, depth-first and pre-order */
  recursive?: boolean
}

/**
 * Base name of an entry, without its last extension. Dotfiles such as
 * `.forceignore` keep their whole name.
 */
export function stripExtension(name: string): string {
  return path.parse(name).name
}

export class DirectoryScanner {
  constructor(private readonly reader: DirectoryReader = new NodeDirectoryReader()) {}

  /**
   * Immediate child directories of `root`, hidden ones included, in listing order.
   */
  async listSubfolders(root: string): Promise<FolderHandle[]> {
    const absRoot = path.resolve(root)
    await this.assertDirectory(absRoot)

    const entries = await this.read(absRoot)
    const folders = entries
      .filter(entry => entry.isDirectory)
      .map(entry => ({ name: entry.name, path: path.join(absRoot, entry.name) }))

    log.debug(`Found ${folders.length} folders under ${absRoot}`)
    return folders
  }

  /**
   * Base names of the entries in `folder`. Directories are listed alongside files
   * (Aura bundles are directories) under their full name. Files lose their
   * extension, so names that differ only by extension repeat.
   */
  async listFiles(folder: string, options: ListFilesOptions = {}): Promise<string[]> {
    const absFolder = path.resolve(folder)
    await this.assertDirectory(absFolder)

    const names: string[] = []
    await this.collect(absFolder, options.exclude ?? [], options.recursive ?? false, names)

    log.debug(`Listed ${names.length} entries in ${absFolder}`)
    return names
  }

  private async collect(
    dir: string,
    exclude: readonly string[],
    recursive: boolean,
    names: string[],
  ): Promise<void> {
    const entries = await this.read(dir)

    for (const entry of entries) {
      if (matchesAny(entry.name, exclude)) {
        log.trace(`Excluded ${path.join(dir, entry.name)}`)
        continue
      }
      // Directory names are kept whole: a bundle named lib.v2 stays lib.v2
      names.push(entry.isDirectory ? entry.name : stripExtension(entry.name))
      if (recursive && entry.isDirectory)
        await this.collect(path.join(dir, entry.name), exclude, recursive, names)
    }
  }

  private async assertDirectory(target: string): Promise<void> {
    let isDirectory: boolean
    try {
      isDirectory = await this.reader.isDirectory(target)
    }
    catch (error) {
      throw scanError(target, error)
    }
    if (!isDirectory)
      throw notFoundError(target)
  }

  private async read(dir: string): Promise<DirectoryEntry[]> {
    try {
      return await this.reader.readEntries(dir)
    }
    catch (error) {
      throw scanError(dir, error)
    }
  }
}
