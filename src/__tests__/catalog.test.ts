import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { loadCatalog, pickStartIndex } from '../catalog'
import { StartupError } from '../errors'

const EXTENSIONS = ['mp3', 'wav', 'm4a', 'aac']

describe('loadCatalog', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'catalog-'))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  async function touch(...names: string[]) {
    for (const n of names) await fs.writeFile(path.join(dir, n), '')
  }

  it('groups by extension order and sorts within a group', async () => {
    await touch('b.wav', 'z.mp3', 'a.MP3', 'c.m4a', 'song.aac', 'a.wav')

    const catalog = await loadCatalog(dir, EXTENSIONS)
    expect(catalog.map((t) => t.name)).toEqual(['a.MP3', 'z.mp3', 'a.wav', 'b.wav', 'c.m4a', 'song.aac'])
    expect(catalog[0].path).toBe(path.join(dir, 'a.MP3'))
  })

  it('skips other files and directories', async () => {
    await touch('notes.txt', 'cover.jpg', 'one.mp3')
    await fs.mkdir(path.join(dir, 'nested.mp3'))

    const catalog = await loadCatalog(dir, EXTENSIONS)
    expect(catalog.map((t) => t.name)).toEqual(['one.mp3'])
  })

  it('returns a frozen catalog', async () => {
    await touch('one.mp3')
    const catalog = await loadCatalog(dir, EXTENSIONS)
    expect(Object.isFrozen(catalog)).toBe(true)
  })

  it('fails on an empty directory', async () => {
    await touch('readme.md')
    await expect(loadCatalog(dir, EXTENSIONS)).rejects.toThrow(StartupError)
  })

  it('fails on a missing directory', async () => {
    await expect(loadCatalog(path.join(dir, 'missing'), EXTENSIONS)).rejects.toThrow(/Audio library not readable/)
  })
})

describe('pickStartIndex', () => {
  const catalog = [
    { path: '/a.mp3', name: 'a.mp3' },
    { path: '/b.mp3', name: 'b.mp3' },
    { path: '/c.mp3', name: 'c.mp3' },
  ]

  it('starts at 0 unless random', () => {
    expect(pickStartIndex(catalog, false)).toBe(0)
  })

  it('stays in range when random', () => {
    for (let i = 0; i < 50; i++) {
      const idx = pickStartIndex(catalog, true)
      expect(idx).toBeGreaterThanOrEqual(0)
      expect(idx).toBeLessThan(3)
    }
  })
})
