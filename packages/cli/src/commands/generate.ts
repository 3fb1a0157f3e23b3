import type { Command } from 'commander'
import type { ConfigFlags, SfpackConfig } from '../config'
import path from 'node:path'
import {
  countMembers,
  DirectoryScanner,
  LISTING_EXCLUDE_PATTERNS,
  ManifestBuilder,
  renderMemberListing,
  writeManifest,
} from '@sfpack/manifest'
import { createLogger, setLogLevel } from '@sfpack/utils/logger'
import { resolveConfig } from '../config'

const log = createLogger('generate')

/** Where single-directory listings go; process.stdout in the CLI */
export interface OutputSink {
  write: (chunk: string) => unknown
}

export type GenerateResult =
  | { mode: 'listing', directory: string, memberCount: number }
  | { mode: 'manifest', outputPath: string, groupCount: number, memberCount: number }

/**
 * Run one invocation. A non-empty `dir` lists that subfolder's members to `out`;
 * otherwise the manifest for `root` is written to `root/packageName`.
 */
export async function runGenerate(
  config: SfpackConfig,
  out: OutputSink = process.stdout,
  scanner: DirectoryScanner = new DirectoryScanner(),
): Promise<GenerateResult> {
  if (config.dir !== '') {
    const directory = path.resolve(config.root, config.dir)
    log.debug(`Listing members of ${directory}`)

    const names = await scanner.listFiles(directory, {
      exclude: LISTING_EXCLUDE_PATTERNS,
      recursive: true,
    })
    out.write(renderMemberListing(names))
    return { mode: 'listing', directory, memberCount: names.length }
  }

  const builder = new ManifestBuilder({
    scanner,
    apiVersion: config.apiVersion,
    xmlNamespace: config.xmlnsSource,
  })
  const manifest = await builder.build(config.root)

  const outputPath = path.join(config.root, config.packageName)
  await writeManifest(manifest, outputPath)

  const memberCount = countMembers(manifest)
  log.success(`Wrote ${outputPath} (${manifest.groups.length} types, ${memberCount} members)`)
  return { mode: 'manifest', outputPath, groupCount: manifest.groups.length, memberCount }
}

export function registerGenerateCommand(program: Command, out: OutputSink = process.stdout): void {
  program
    .option('--root <path>', 'Project root to scan (default: current directory)')
    .option('--dir <name>', 'List the members of one subfolder instead of writing a manifest')
    .option('--api-version <version>', 'Value of the <version> element (default: 31.0)')
    .option('--package-name <file>', 'Manifest file name, written under the root (default: package.xml)')
    .option('--xmlns-source <url>', 'Namespace of the <Package> element')
    .action(async (options: ConfigFlags) => {
      try {
        const config = resolveConfig(options)
        setLogLevel(config.logLevel)
        await runGenerate(config, out)
      }
      catch (error) {
        const msg = error instanceof Error ? error.message : String(error)
        log.error(msg)
        process.exit(1)
      }
    })
}
