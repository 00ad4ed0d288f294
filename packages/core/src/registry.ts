/**
 * ComponentRegistry - role → name → factory lookup.
 *
 * Roles form a closed set (see roles.ts). Re-registering a (role, name) pair
 * replaces the previous factory, which is how plugins override built-ins.
 */

import type {
  Builder,
  Fetcher,
  Generator,
  Mapper,
  Parser,
  Refiner,
  Seeder,
  Splitter,
  Writer,
} from './capabilities.js'
import type { ComponentContext } from './component.js'
import {
  CoreError,
  ErrorCodes,
  UnknownRoleError,
  UnresolvedComponentError,
} from './errors.js'
import { ROLES, isRole, type Role } from './roles.js'

/**
 * Component type each role's factories must produce.
 */
export interface RoleComponentMap {
  seeder: Seeder
  fetcher: Fetcher
  generator: Generator
  parser: Parser
  refiner: Refiner
  splitter: Splitter
  mapper: Mapper
  builder: Builder
  writer: Writer
}

export type ComponentFactory<R extends Role = Role> = (
  context: ComponentContext
) => RoleComponentMap[R]

type FactoryTable = { [R in Role]: Map<string, ComponentFactory<R>> }

export class ComponentRegistry {
  private readonly factories: FactoryTable = {
    seeder: new Map(),
    fetcher: new Map(),
    generator: new Map(),
    parser: new Map(),
    refiner: new Map(),
    splitter: new Map(),
    mapper: new Map(),
    builder: new Map(),
    writer: new Map(),
  }

  /**
   * @throws UnknownRoleError when `role` is not a declared role
   */
  register<R extends Role>(role: R, name: string, factory: ComponentFactory<R>): this
  register(role: string, name: string, factory: ComponentFactory): this
  register(role: string, name: string, factory: ComponentFactory): this {
    if (!isRole(role)) {
      throw new UnknownRoleError(role, ROLES)
    }
    this.tableFor(role).set(name, factory)
    return this
  }

  /**
   * @throws UnresolvedComponentError when nothing is registered under `name`
   */
  resolve<R extends Role>(role: R, name: string): ComponentFactory<R> {
    const factory = this.factories[role].get(name)
    if (!factory) {
      throw new UnresolvedComponentError(role, name, this.list(role))
    }
    return factory
  }

  /**
   * Build a component from the factory registered under (role, name).
   *
   * @throws UnresolvedComponentError when nothing is registered under `name`
   * @throws CoreError when the factory builds a component of another role
   */
  create<R extends Role>(role: R, name: string, context: ComponentContext): RoleComponentMap[R] {
    const component = this.resolve(role, name)(context)
    if (component.role !== role) {
      throw new CoreError(
        ErrorCodes.UNRESOLVED_COMPONENT,
        `Factory '${name}' registered as ${role} built a ${component.role}`
      )
    }
    return component
  }

  has(role: Role, name: string): boolean {
    return this.factories[role].has(name)
  }

  /** Registered names for a role, sorted */
  list(role: Role): string[] {
    return [...this.factories[role].keys()].sort()
  }

  roles(): readonly Role[] {
    return ROLES
  }

  /**
   * Map of every role to its registered names, in role order.
   */
  describe(): Record<Role, string[]> {
    return {
      seeder: this.list('seeder'),
      fetcher: this.list('fetcher'),
      generator: this.list('generator'),
      parser: this.list('parser'),
      refiner: this.list('refiner'),
      splitter: this.list('splitter'),
      mapper: this.list('mapper'),
      builder: this.list('builder'),
      writer: this.list('writer'),
    }
  }

  // Untyped registrations land here too; create() checks the built role
  private tableFor(role: Role): Map<string, ComponentFactory> {
    return this.factories[role]
  }
}
