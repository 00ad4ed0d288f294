/**
 * Capability roles an adapter can be registered under. The set is closed:
 * anything else is rejected by the registry.
 */
export const ROLES = [
  'seeder',
  'fetcher',
  'generator',
  'parser',
  'refiner',
  'splitter',
  'mapper',
  'builder',
  'writer',
] as const

export type Role = (typeof ROLES)[number]

export function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value)
}

/**
 * Pipeline stage each role serves, in execution order.
 */
export const STAGE_OF_ROLE: Record<Role, string> = {
  seeder: 'seed',
  fetcher: 'fetch',
  generator: 'generate',
  parser: 'parse',
  refiner: 'refine',
  splitter: 'chunk',
  mapper: 'wrap',
  builder: 'assemble',
  writer: 'store',
}
