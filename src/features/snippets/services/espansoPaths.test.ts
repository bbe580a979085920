import { beforeEach, describe, expect, it, vi } from 'vitest'
import { espansoConfigCandidates, findDefaultMatchDir } from './espansoPaths'

const dirs = (...paths: string[]) => {
  const existing = new Set(paths)
  return async (path: string) => existing.has(path)
}

describe('espansoConfigCandidates', () => {
  it('lists the config folders per platform', () => {
    expect(espansoConfigCandidates('linux', {}, '/home/ana')).toEqual([
      '/home/ana/.config/espanso',
      '/home/ana/.espanso',
    ])
    expect(espansoConfigCandidates('darwin', {}, '/Users/ana')).toEqual([
      '/Users/ana/Library/Application Support/espanso',
      '/Users/ana/.config/espanso',
    ])
    expect(espansoConfigCandidates('win32', { APPDATA: '/roaming' }, '/home/ana')).toEqual(['/roaming/espanso'])
    expect(espansoConfigCandidates('aix', {}, '/home/ana')).toEqual([])
  })
})

describe('findDefaultMatchDir', () => {
  beforeEach(() => {
    vi.restoreAllMocks()
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  it('returns the match folder of the first existing config folder', async () => {
    const found = await findDefaultMatchDir({
      platform: 'linux',
      env: {},
      home: '/home/ana',
      isDir: dirs('/home/ana/.config/espanso', '/home/ana/.config/espanso/match'),
    })

    expect(found).toBe('/home/ana/.config/espanso/match')
  })

  it('falls back to the legacy user folder', async () => {
    const found = await findDefaultMatchDir({
      platform: 'linux',
      env: {},
      home: '/home/ana',
      isDir: dirs('/home/ana/.espanso', '/home/ana/.espanso/user'),
    })

    expect(found).toBe('/home/ana/.espanso/user')
  })

  it('returns null when nothing usable exists', async () => {
    expect(await findDefaultMatchDir({ platform: 'linux', env: {}, home: '/home/ana', isDir: dirs() })).toBeNull()
    expect(
      await findDefaultMatchDir({
        platform: 'linux',
        env: {},
        home: '/home/ana',
        isDir: dirs('/home/ana/.config/espanso'),
      }),
    ).toBeNull()
    expect(console.warn).toHaveBeenCalledTimes(2)
  })
})
