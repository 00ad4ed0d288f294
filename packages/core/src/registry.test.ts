import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import { Fetcher, Seeder, type FetchedResource } from './capabilities.js'
import { UnknownRoleError, UnresolvedComponentError } from './errors.js'
import { ComponentRegistry } from './registry.js'
import { Logger } from './logger.js'

const quiet = new Logger('error', () => {})
const NoOptions = z.object({})

class StaticSeeder extends Seeder<z.infer<typeof NoOptions>> {
  protected readonly optionsSchema = NoOptions

  constructor(readonly name: string) {
    super({ logger: quiet })
  }

  protected async doSeed(source: string): Promise<string[]> {
    return [source]
  }
}

class NullFetcher extends Fetcher<z.infer<typeof NoOptions>> {
  readonly name = 'NullFetcher'
  protected readonly optionsSchema = NoOptions

  protected async doFetch(): Promise<FetchedResource | null> {
    return null
  }
}

describe('ComponentRegistry', () => {
  it('resolves the exact factory that was registered', () => {
    const registry = new ComponentRegistry()
    const factory = () => new StaticSeeder('first')
    registry.register('seeder', 'static', factory)

    expect(registry.resolve('seeder', 'static')).toBe(factory)
  })

  it('builds components from a registered factory', () => {
    const registry = new ComponentRegistry()
    registry.register('seeder', 'static', () => new StaticSeeder('first'))

    const seeder = registry.create('seeder', 'static', { logger: quiet })

    expect(seeder.name).toBe('first')
    expect(registry.has('seeder', 'static')).toBe(true)
  })

  it('lets the last registration win', () => {
    const registry = new ComponentRegistry()
    registry.register('seeder', 'static', () => new StaticSeeder('first'))
    registry.register('seeder', 'static', () => new StaticSeeder('second'))

    expect(registry.resolve('seeder', 'static')({ logger: quiet }).name).toBe('second')
    expect(registry.list('seeder')).toEqual(['static'])
  })

  it('rejects undeclared roles', () => {
    const registry = new ComponentRegistry()

    expect(() =>
      registry.register('transformer', 'x', () => new StaticSeeder('x'))
    ).toThrow(UnknownRoleError)
  })

  it('lists registered names when a component is missing', () => {
    const registry = new ComponentRegistry()
    registry.register('fetcher', 'null', () => new NullFetcher())

    expect(() => registry.resolve('fetcher', 'http')).toThrow(UnresolvedComponentError)
    try {
      registry.resolve('fetcher', 'http')
    } catch (error) {
      expect(error).toMatchObject({ suggestion: 'Registered fetcher components: null' })
    }
  })

  it('refuses a factory that builds the wrong role', () => {
    const registry = new ComponentRegistry()
    registry.register('fetcher', 'seeder-in-disguise', () => new StaticSeeder('s'))

    expect(() => registry.create('fetcher', 'seeder-in-disguise', { logger: quiet })).toThrow(
      "Factory 'seeder-in-disguise' registered as fetcher built a seeder"
    )
  })

  it('describes every role', () => {
    const registry = new ComponentRegistry()
    registry.register('fetcher', 'null', () => new NullFetcher())
    registry.register('seeder', 'b', () => new StaticSeeder('b'))
    registry.register('seeder', 'a', () => new StaticSeeder('a'))

    const described = registry.describe()

    expect(described.seeder).toEqual(['a', 'b'])
    expect(described.fetcher).toEqual(['null'])
    expect(described.writer).toEqual([])
    expect(Object.keys(described)).toEqual([...registry.roles()])
  })
})
