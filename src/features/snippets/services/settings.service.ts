import { homedir } from 'node:os'
import { join } from 'node:path'
import { getErrorCode } from '@/shared/lib/error'
import { readText, writeText } from '@/shared/lib/fs'

export type WindowGeometry = {
  x: number
  y: number
  width: number
  height: number
}

export type Settings = {
  matchFolder?: string
  lastSelectedFile?: string
  windowGeometry?: WindowGeometry
  skipPackageWarning?: boolean
}

const SETTINGS_FILE = 'settings.json'

export const settingsDir = (
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
) => {
  if (env.EZPANSO_CONFIG_DIR) return env.EZPANSO_CONFIG_DIR
  switch (platform) {
    case 'darwin':
      return join(home, 'Library', 'Preferences', 'ezpanso')
    case 'win32':
      return join(env.LOCALAPPDATA || join(home, 'AppData', 'Local'), 'EZpanso')
    default:
      return join(env.XDG_CONFIG_HOME || join(home, '.config'), 'ezpanso')
  }
}

const settingsPath = () => join(settingsDir(), SETTINGS_FILE)

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const isGeometry = (value: unknown): value is WindowGeometry =>
  isRecord(value) &&
  ['x', 'y', 'width', 'height'].every((key) => typeof value[key] === 'number')

const sanitize = (raw: unknown): Settings => {
  if (!isRecord(raw)) return {}
  const out: Settings = {}
  if (typeof raw.matchFolder === 'string') out.matchFolder = raw.matchFolder
  if (typeof raw.lastSelectedFile === 'string') out.lastSelectedFile = raw.lastSelectedFile
  if (isGeometry(raw.windowGeometry)) out.windowGeometry = raw.windowGeometry
  if (typeof raw.skipPackageWarning === 'boolean') out.skipPackageWarning = raw.skipPackageWarning
  return out
}

export const readSettings = async (): Promise<Settings> => {
  const path = settingsPath()
  try {
    return sanitize(JSON.parse(await readText(path)))
  } catch (err) {
    if (getErrorCode(err) !== 'ENOENT') {
      console.warn('Ignoring unreadable settings file', path, err)
    }
    return {}
  }
}

const storeSetting = async <K extends keyof Settings>(key: K, value: Settings[K]) => {
  const path = settingsPath()
  try {
    const next = { ...(await readSettings()), [key]: value }
    await writeText(path, `${JSON.stringify(next, null, 2)}\n`)
  } catch (err) {
    console.error('Failed to store setting', key, err)
  }
}

export const loadMatchFolder = async () => (await readSettings()).matchFolder ?? null

export const storeMatchFolder = (value: string) => storeSetting('matchFolder', value)

export const loadLastSelectedFile = async () => (await readSettings()).lastSelectedFile ?? null

export const storeLastSelectedFile = (value: string) => storeSetting('lastSelectedFile', value)

export const loadWindowGeometry = async () => (await readSettings()).windowGeometry ?? null

export const storeWindowGeometry = (value: WindowGeometry) => storeSetting('windowGeometry', value)

export const loadSkipPackageWarning = async () => (await readSettings()).skipPackageWarning ?? false

export const storeSkipPackageWarning = (value: boolean) => storeSetting('skipPackageWarning', value)
