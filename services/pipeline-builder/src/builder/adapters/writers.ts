import fs from 'fs/promises'
import type { FileHandle } from 'fs/promises'
import path from 'path'
import { Writer, type BuiltObject } from '@graphweave/core'
import { z } from 'zod'
import { toLocalPath } from '../urls.js'

export const JsonFileWriterOptionsSchema = z.object({
  pretty: z.boolean().default(true),
})

export type JsonFileWriterOptions = z.infer<typeof JsonFileWriterOptionsSchema>

/**
 * Writes the built object as a single JSON document `{ kind, entities }`,
 * entities keyed by unit id. The file is written on close.
 */
export class JsonFileWriter extends Writer<JsonFileWriterOptions> {
  readonly name = 'JsonFileWriter'
  protected readonly optionsSchema = JsonFileWriterOptionsSchema
  private target: string | null = null
  private entities: Record<string, Record<string, unknown>> = {}

  protected async open(destination: string): Promise<void> {
    this.target = toLocalPath(destination)
    this.entities = {}
    await fs.mkdir(path.dirname(this.target), { recursive: true })
  }

  protected async writeUnit(record: Record<string, unknown>, id: string): Promise<void> {
    this.entities[id] = record
  }

  protected async close(built: BuiltObject): Promise<void> {
    if (this.target === null) return
    const document = { kind: built.kind, entities: this.entities }
    const text = this.options.pretty
      ? JSON.stringify(document, null, 2)
      : JSON.stringify(document)
    await fs.writeFile(this.target, `${text}\n`, 'utf-8')
    this.target = null
  }
}

const NoOptionsSchema = z.object({})

/**
 * One JSON record per line.
 */
export class JsonlWriter extends Writer<z.infer<typeof NoOptionsSchema>> {
  readonly name = 'JsonlWriter'
  protected readonly optionsSchema = NoOptionsSchema
  private handle: FileHandle | null = null

  protected async open(destination: string): Promise<void> {
    const target = toLocalPath(destination)
    await fs.mkdir(path.dirname(target), { recursive: true })
    this.handle = await fs.open(target, 'w')
  }

  protected async writeUnit(record: Record<string, unknown>): Promise<void> {
    if (!this.handle) throw new Error('Destination is not open')
    await this.handle.write(`${JSON.stringify(record)}\n`)
  }

  protected async close(): Promise<void> {
    await this.handle?.close()
    this.handle = null
  }

  protected async teardown(): Promise<void> {
    await this.close()
  }
}

export const ConsoleWriterOptionsSchema = z.object({
  pretty: z.boolean().default(false),
})

export type ConsoleWriterOptions = z.infer<typeof ConsoleWriterOptionsSchema>

/**
 * Prints every unit to stdout. The destination is only used in log lines.
 */
export class ConsoleWriter extends Writer<ConsoleWriterOptions> {
  readonly name = 'ConsoleWriter'
  protected readonly optionsSchema = ConsoleWriterOptionsSchema

  protected async open(): Promise<void> {}

  protected async writeUnit(record: Record<string, unknown>): Promise<void> {
    console.log(this.options.pretty ? JSON.stringify(record, null, 2) : JSON.stringify(record))
  }

  protected async close(): Promise<void> {}
}
