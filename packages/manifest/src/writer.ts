import type { Manifest } from './types'
import type { FileHandle } from 'node:fs/promises'
import { open, rename, rm } from 'node:fs/promises'
import { createLogger } from '@sfpack/utils/logger'
import { XMLBuilder } from 'fast-xml-parser'
import { ioError } from './errors'

const log = createLogger('write')

const CRLF = '\r\n'

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: true,
  indentBy: '\t',
  suppressEmptyNode: false,
})

interface PackageTypesNode {
  members?: string[]
  name: string
}

/**
 * Serialize a manifest to package.xml text: tab indentation, CRLF line breaks and a
 * declaration without an encoding attribute. Members keep manifest order.
 */
export function renderManifest(manifest: Manifest): string {
  const types = manifest.groups.map((group) => {
    const node: PackageTypesNode = { name: group.typeName }
    // Key order decides element order: members before name
    return group.members.length > 0 ? { members: [...group.members], ...node } : node
  })

  const xml: string = builder.build({
    '?xml': { '@_version': '1.0' },
    'Package': {
      '@_xmlns': manifest.xmlNamespace,
      'types': types,
      'version': manifest.apiVersion,
    },
  })
  return xml.replace(/\r?\n/g, CRLF)
}

/**
 * Member listing for a single directory: one `<members>` fragment per name, no
 * root element. Names are written as found.
 */
export function renderMemberListing(names: readonly string[]): string {
  return names.map(name => `<members>${name}</members>${CRLF}`).join('')
}

/**
 * Write the rendered manifest to `destination`. Bytes go to a temporary sibling
 * first and replace the destination only after the handle is flushed and closed,
 * so a failed run leaves any previous file untouched.
 */
export async function writeManifest(manifest: Manifest, destination: string): Promise<void> {
  const content = renderManifest(manifest)
  const tempPath = `${destination}.${process.pid}.tmp`

  try {
    let handle: FileHandle | undefined
    try {
      handle = await open(tempPath, 'w')
      await handle.writeFile(content, 'utf8')
      await handle.sync()
    }
    finally {
      await handle?.close()
    }
    await rename(tempPath, destination)
  }
  catch (error) {
    await rm(tempPath, { force: true })
    throw ioError(destination, error)
  }

  log.debug(`Wrote ${Buffer.byteLength(content, 'utf8')} bytes to ${destination}`)
}
