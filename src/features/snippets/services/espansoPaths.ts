import { homedir } from 'node:os'
import { join } from 'node:path'
import { isDirectory } from '@/shared/lib/fs'

type Options = {
  platform?: NodeJS.Platform
  env?: NodeJS.ProcessEnv
  home?: string
  isDir?: (path: string) => Promise<boolean>
}

export const espansoConfigCandidates = (
  platform: NodeJS.Platform,
  env: NodeJS.ProcessEnv,
  home: string,
): string[] => {
  switch (platform) {
    case 'linux':
      return [join(env.XDG_CONFIG_HOME || join(home, '.config'), 'espanso'), join(home, '.espanso')]
    case 'darwin':
      return [join(home, 'Library', 'Application Support', 'espanso'), join(home, '.config', 'espanso')]
    case 'win32':
      return [env.APPDATA, env.LOCALAPPDATA]
        .filter((dir): dir is string => Boolean(dir))
        .map((dir) => join(dir, 'espanso'))
    default:
      return []
  }
}

/** Best guess at Espanso's match folder; null when nothing usable exists. */
export const findDefaultMatchDir = async (opts: Options = {}): Promise<string | null> => {
  const platform = opts.platform ?? process.platform
  const isDir = opts.isDir ?? isDirectory
  const candidates = espansoConfigCandidates(platform, opts.env ?? process.env, opts.home ?? homedir())

  let configDir: string | null = null
  for (const candidate of candidates) {
    if (await isDir(candidate)) {
      configDir = candidate
      break
    }
  }
  if (!configDir) {
    console.warn('Could not determine the Espanso config directory')
    return null
  }

  const matchDir = join(configDir, 'match')
  if (await isDir(matchDir)) return matchDir
  // Older Espanso releases kept snippets under user/.
  const userDir = join(configDir, 'user')
  if (await isDir(userDir)) return userDir
  console.warn(`Espanso config directory ${configDir} has no match or user folder`)
  return null
}
