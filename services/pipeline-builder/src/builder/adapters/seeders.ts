import fs from 'fs/promises'
import path from 'path'
import { Seeder, SeederError } from '@graphweave/core'
import { z } from 'zod'
import { isFileUrl, isHttpUrl, toLocalPath } from '../urls.js'

const NoOptionsSchema = z.object({})

/**
 * The source itself is the only seed.
 */
export class UriSeeder extends Seeder<z.infer<typeof NoOptionsSchema>> {
  readonly name = 'UriSeeder'
  protected readonly optionsSchema = NoOptionsSchema

  protected async doSeed(source: string): Promise<string[]> {
    return [source.trim()]
  }
}

/**
 * Identifiers listed one per line in a manifest file. Blank lines and `#`
 * comments are ignored; relative paths resolve against the manifest's directory.
 */
export class ManifestSeeder extends Seeder<z.infer<typeof NoOptionsSchema>> {
  readonly name = 'ManifestSeeder'
  protected readonly optionsSchema = NoOptionsSchema

  protected async doSeed(source: string): Promise<string[]> {
    const manifestPath = toLocalPath(source)
    const text = await fs.readFile(manifestPath, 'utf-8')
    const baseDir = path.dirname(manifestPath)

    return text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line !== '' && !line.startsWith('#'))
      .map((line) =>
        isHttpUrl(line) || isFileUrl(line) || path.isAbsolute(line)
          ? line
          : path.resolve(baseDir, line)
      )
  }
}

export const DirectorySeederOptionsSchema = z.object({
  extensions: z
    .array(z.string().regex(/^\.\w+$/, 'extensions look like ".md"'))
    .default(['.md', '.markdown', '.html', '.htm', '.txt', '.json']),
  recursive: z.boolean().default(true),
})

export type DirectorySeederOptions = z.infer<typeof DirectorySeederOptionsSchema>

/**
 * Files under a directory, filtered by extension, in sorted path order.
 */
export class DirectorySeeder extends Seeder<DirectorySeederOptions> {
  readonly name = 'DirectorySeeder'
  protected readonly optionsSchema = DirectorySeederOptionsSchema

  protected async doSeed(source: string): Promise<string[]> {
    const root = toLocalPath(source)
    const stat = await fs.stat(root)
    if (!stat.isDirectory()) {
      throw new SeederError(this.role, this.name, `${root} is not a directory`, {
        retryable: false,
      })
    }

    const extensions = new Set(this.options.extensions.map((ext) => ext.toLowerCase()))
    const files = await this.walk(root)
    return files.filter((file) => extensions.has(path.extname(file).toLowerCase())).sort()
  }

  private async walk(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true })
    const files: string[] = []
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name)
      if (entry.isDirectory()) {
        if (this.options.recursive) files.push(...(await this.walk(fullPath)))
      } else if (entry.isFile()) {
        files.push(fullPath)
      }
    }
    return files
  }
}
