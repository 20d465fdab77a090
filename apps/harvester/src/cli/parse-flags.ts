import { HARVESTER_ERROR_CODES, HarvesterError } from '../errors.js'

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

/**
 * Read an optional positive integer id flag. Throws on a value that is not one.
 */
export function readIdFlag(flags: Flags, key: string): number | undefined {
  const value = flags[key]
  if (value === undefined) {
    return undefined
  }
  const parsed = typeof value === 'string' ? Number(value) : NaN
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new HarvesterError(
      HARVESTER_ERROR_CODES.INVALID_ARGUMENT,
      `--${key} expects a positive integer, got ${value === true ? 'no value' : `"${value}"`}`
    )
  }
  return parsed
}
