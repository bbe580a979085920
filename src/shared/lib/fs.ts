import { mkdir, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'

import { normalizeError } from './error'

const wrap = async <T>(run: () => Promise<T>): Promise<T> => {
  try {
    return await run()
  } catch (error) {
    throw normalizeError(error)
  }
}

export type DirItem = {
  name: string
  kind: 'dir' | 'file' | 'other'
}

export const readText = (path: string) => wrap(() => readFile(path, 'utf8'))

export const writeText = (path: string, content: string) =>
  wrap(async () => {
    await mkdir(dirname(path), { recursive: true })
    await writeFile(path, content, 'utf8')
  })

export const listDir = (path: string) =>
  wrap(async (): Promise<DirItem[]> => {
    const items = await readdir(path, { withFileTypes: true })
    return items.map((item) => ({
      name: item.name,
      kind: item.isDirectory() ? 'dir' : item.isFile() ? 'file' : 'other',
    }))
  })

export const removeFile = (path: string) => wrap(() => rm(path))

export const isDirectory = async (path: string) => {
  try {
    return (await stat(path)).isDirectory()
  } catch {
    return false
  }
}

export const pathExists = async (path: string) => {
  try {
    await stat(path)
    return true
  } catch {
    return false
  }
}

export const modifiedTime = async (path: string): Promise<Date | null> => {
  try {
    return (await stat(path)).mtime
  } catch {
    return null
  }
}
