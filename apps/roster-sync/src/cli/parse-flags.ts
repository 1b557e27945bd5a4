export type Flags = Record<string, string | boolean>

/**
 * Parse `--key value`, `--key=value` and bare `--switch` tokens.
 * Flags named in `switches` never consume the next token. Tokens that are
 * not flags and do not follow one are returned as positionals.
 */
export function parseFlags(
  argv: string[],
  switches: ReadonlySet<string> = new Set()
): { flags: Flags; positionals: string[] } {
  const flags: Flags = {}
  const positionals: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      positionals.push(token)
      continue
    }

    const body = token.slice(2)
    const eq = body.indexOf('=')
    if (eq > 0) {
      flags[body.slice(0, eq)] = body.slice(eq + 1)
      continue
    }

    const next = argv[i + 1]
    if (!switches.has(body) && next !== undefined && !next.startsWith('--')) {
      flags[body] = next
      i++
    } else {
      flags[body] = true
    }
  }

  return { flags, positionals }
}

export function asString(value: string | boolean | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined
}
