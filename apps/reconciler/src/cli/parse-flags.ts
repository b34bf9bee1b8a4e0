export type Flags = Record<string, string | boolean>

export function parseFlags(argv: string[]): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      continue
    }

    const key = token.slice(2)
    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && !argv[j].startsWith('--')) {
      valueTokens.push(argv[j])
      j++
    }

    if (valueTokens.length > 0) {
      flags[key] = valueTokens.join(' ')
      i = j - 1
    } else {
      flags[key] = true
    }
  }

  return flags
}

export function asString(value: string | boolean | undefined): string {
  return typeof value === 'string' ? value : ''
}

export function asOptionalString(value: string | boolean | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined
}

/**
 * undefined when absent, NaN when present but not an integer
 */
export function asInteger(value: string | boolean | undefined): number | undefined {
  if (value === undefined) {
    return undefined
  }
  if (typeof value !== 'string' || !/^-?\d+$/.test(value)) {
    return Number.NaN
  }
  return Number.parseInt(value, 10)
}
