import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { Logger, SeederError } from '@graphweave/core'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { DirectorySeeder, ManifestSeeder, UriSeeder } from './seeders.js'

const quiet = new Logger('error', () => {})

describe('seeders', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'seeders-'))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('uri seeds the source itself', async () => {
    const seeder = new UriSeeder({ logger: quiet })
    await seeder.initialize()

    expect(await seeder.seed(' https://example.com/docs ')).toEqual(['https://example.com/docs'])
  })

  it('manifest reads one identifier per line and resolves relative paths', async () => {
    const manifest = path.join(dir, 'sources.txt')
    await fs.writeFile(
      manifest,
      '# docs to index\nhttps://example.com/a\n\npages/intro.md\n/srv/shared/b.md\n'
    )
    const seeder = new ManifestSeeder({ logger: quiet })
    await seeder.initialize()

    expect(await seeder.seed(manifest)).toEqual([
      'https://example.com/a',
      path.join(dir, 'pages/intro.md'),
      '/srv/shared/b.md',
    ])
  })

  it('directory lists matching files in sorted order', async () => {
    await fs.mkdir(path.join(dir, 'guide'))
    await fs.writeFile(path.join(dir, 'b.md'), 'B')
    await fs.writeFile(path.join(dir, 'a.txt'), 'A')
    await fs.writeFile(path.join(dir, 'logo.png'), 'PNG')
    await fs.writeFile(path.join(dir, 'guide', 'c.md'), 'C')
    const seeder = new DirectorySeeder({ logger: quiet })
    await seeder.initialize({ extensions: ['.md'] })

    expect(await seeder.seed(dir)).toEqual([
      path.join(dir, 'b.md'),
      path.join(dir, 'guide', 'c.md'),
    ])
  })

  it('directory stays at the top level when not recursive', async () => {
    await fs.mkdir(path.join(dir, 'guide'))
    await fs.writeFile(path.join(dir, 'a.md'), 'A')
    await fs.writeFile(path.join(dir, 'guide', 'c.md'), 'C')
    const seeder = new DirectorySeeder({ logger: quiet })
    await seeder.initialize({ recursive: false })

    expect(await seeder.seed(dir)).toEqual([path.join(dir, 'a.md')])
  })

  it('directory rejects a file source without retrying', async () => {
    const file = path.join(dir, 'a.md')
    await fs.writeFile(file, 'A')
    const seeder = new DirectorySeeder({ logger: quiet })
    await seeder.initialize()

    const error = await seeder.seed(file).catch((e: unknown) => e)
    expect(error).toBeInstanceOf(SeederError)
    expect(error).toMatchObject({
      retryable: false,
      message: `[DirectorySeeder] ${file} is not a directory`,
    })
  })
})
