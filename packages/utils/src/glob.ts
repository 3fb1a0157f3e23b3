/**
 * Name-level glob matching for directory entries.
 *
 * Patterns apply to a single entry name, never to a path: `*` matches any run of
 * characters and `?` matches exactly one. Matching ignores case, so `*.txt`
 * also drops `README.TXT`.
 */

const compiled = new Map<string, RegExp>()

export function globMatch(name: string, pattern: string): boolean {
  let regex = compiled.get(pattern)
  if (!regex) {
    regex = compileGlob(pattern)
    compiled.set(pattern, regex)
  }
  return regex.test(name)
}

export function matchesAny(name: string, patterns: readonly string[]): boolean {
  return patterns.some(pattern => globMatch(name, pattern))
}

function compileGlob(pattern: string): RegExp {
  let source = ''
  for (const char of pattern) {
    if (char === '*')
      source += '.*'
    else if (char === '?')
      source += '.'
    else
      source += char.replace(/[.+^${}()|[\]\\/]/g, '\\$&')
  }
  return new RegExp(`^${source}$`, 'is')
}
