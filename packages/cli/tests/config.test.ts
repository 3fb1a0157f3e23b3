import path from 'node:path'
import { ManifestErrorCode } from '@sfpack/manifest/errors'
import { ENV_KEYS, resolveConfig } from '@sfpack/cli/config'
import { describe, expect, it } from 'vitest'

const CWD = path.resolve('/work/project')

describe('resolveConfig', () => {
  it('applies defaults', () => {
    expect(resolveConfig({}, {}, CWD)).toEqual({
      root: CWD,
      dir: '',
      apiVersion: '31.0',
      packageName: 'package.xml',
      xmlnsSource: 'http://soap.sforce.com/2006/04/metadata',
      logLevel: 'info',
    })
  })

  it('reads environment variables', () => {
    const config = resolveConfig({}, {
      [ENV_KEYS.root]: 'src',
      [ENV_KEYS.dir]: 'classes',
      [ENV_KEYS.apiVersion]: '58.0',
      [ENV_KEYS.packageName]: 'destructive.xml',
      [ENV_KEYS.logLevel]: 'debug',
    }, CWD)

    expect(config.root).toBe(path.join(CWD, 'src'))
    expect(config.dir).toBe('classes')
    expect(config.apiVersion).toBe('58.0')
    expect(config.packageName).toBe('destructive.xml')
    expect(config.logLevel).toBe('debug')
  })

  it('lets flags override environment variables', () => {
    const config = resolveConfig(
      { apiVersion: '60.0', root: '/elsewhere' },
      { [ENV_KEYS.apiVersion]: '58.0', [ENV_KEYS.root]: 'src' },
      CWD,
    )
    expect(config.apiVersion).toBe('60.0')
    expect(config.root).toBe(path.resolve('/elsewhere'))
  })

  it('treats empty environment variables as unset', () => {
    const config = resolveConfig({}, { [ENV_KEYS.apiVersion]: '', [ENV_KEYS.dir]: '' }, CWD)
    expect(config.apiVersion).toBe('31.0')
    expect(config.dir).toBe('')
  })

  it.each(['31', '31.0.1', 'v31.0', 'latest'])('accepts any non-empty api version %s', (apiVersion) => {
    expect(resolveConfig({ apiVersion }, {}, CWD).apiVersion).toBe(apiVersion)
  })

  it('accepts a package name with a relative directory', () => {
    expect(resolveConfig({ packageName: 'out/package.xml' }, {}, CWD).packageName).toBe('out/package.xml')
  })

  it.each([
    [{ apiVersion: '' }, 'apiVersion'],
    [{ packageName: '' }, 'packageName'],
    [{ xmlnsSource: 'not a url' }, 'xmlnsSource'],
  ])('rejects %o', (flags, field) => {
    let caught: unknown
    try {
      resolveConfig(flags, {}, CWD)
    }
    catch (error) {
      caught = error
    }
    expect(caught).toMatchObject({ code: ManifestErrorCode.INVALID_CONFIG })
    expect(caught instanceof Error && caught.message).toContain(`${field}:`)
  })

  it('rejects an unknown log level', () => {
    expect(() => resolveConfig({}, { [ENV_KEYS.logLevel]: 'loud' }, CWD)).toThrow(/logLevel/)
  })
})
