import { InvalidArgumentError } from 'commander'

/**
 * Commander collector for repeatable options
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

export function parseInteger(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Not an integer: ${value}`)
  }
  return parsed
}

/**
 * Split `key=value` pairs. The value may itself contain `=`.
 */
export function parseAssignments(pairs: readonly string[]): Record<string, string> {
  const result: Record<string, string> = {}
  for (const pair of pairs) {
    const index = pair.indexOf('=')
    if (index <= 0) {
      throw new InvalidArgumentError(`Expected key=value, got '${pair}'`)
    }
    result[pair.slice(0, index).trim()] = pair.slice(index + 1).trim()
  }
  return result
}

/**
 * Like parseAssignments, but values that read as JSON (numbers, booleans,
 * arrays, objects, quoted strings) are decoded.
 */
export function parseOptionAssignments(pairs: readonly string[]): Record<string, unknown> {
  const result: Record<string, unknown> = {}
  for (const [key, raw] of Object.entries(parseAssignments(pairs))) {
    result[key] = decodeValue(raw)
  }
  return result
}

function decodeValue(raw: string): unknown {
  try {
    return JSON.parse(raw)
  } catch {
    // plain strings stay as typed
    return raw
  }
}
