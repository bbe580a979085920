import { isDeepStrictEqual } from 'node:util'
import { extname, join } from 'node:path'
import { Document, YAMLSeq, isMap, isScalar, isSeq, parseDocument, type Scalar } from 'yaml'
import { describeFsError, getErrorCode, getErrorMessage } from '@/shared/lib/error'
import { isDirectory, listDir, pathExists, readText, removeFile, writeText, type DirItem } from '@/shared/lib/fs'
import { displayNameFor, relativeDisplayName } from '../model/displayName'
import { REPLACE_KEY, TRIGGER_KEY, matchFromYaml, matchToYaml } from '../model/match'
import type { LoadError, LoadResult, LoadedFile, Match, WriteResult } from '../model/types'
import {
  ERROR_FILE_NAME_EMPTY,
  ERROR_FILE_NAME_INVALID_CHARS,
  ERROR_FILE_NAME_UNDERSCORE,
  ERROR_FILE_NO_EXTENSION,
  MSG_INVALID_FOLDER,
  fileExists,
} from '../messages'

export const MATCHES_KEY = 'matches'

const YAML_EXTENSIONS = new Set(['.yml', '.yaml'])

const isSnippetFileName = (name: string) =>
  !name.startsWith('_') && YAML_EXTENSIONS.has(extname(name).toLowerCase())

const compareName = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0)

const collectYamlFiles = async (dir: string, out: string[], errors: LoadError[]) => {
  let items: DirItem[]
  try {
    items = await listDir(dir)
  } catch (err) {
    console.warn('Skipping unreadable folder', dir, err)
    errors.push({ path: dir, message: describeFsError(err) })
    return
  }
  items.sort((a, b) => compareName(a.name, b.name))
  for (const item of items) {
    const path = join(dir, item.name)
    if (item.kind === 'dir') {
      await collectYamlFiles(path, out, errors)
    } else if (item.kind === 'file' && isSnippetFileName(item.name)) {
      out.push(path)
    }
  }
}

type ParsedFile = Omit<LoadedFile, 'displayName'>

const TEXT_KEYS = [TRIGGER_KEY, REPLACE_KEY]

// Numeric or boolean scalars under the text keys, with the text they were written as.
const sourceScalars = (node: unknown) => {
  const found: { key: string; scalar: Scalar; source: string }[] = []
  if (!isMap(node)) return found
  for (const key of TEXT_KEYS) {
    const scalar = node.get(key, true)
    if (!isScalar(scalar) || typeof scalar.source !== 'string') continue
    if (typeof scalar.value === 'number' || typeof scalar.value === 'boolean') {
      found.push({ key, scalar, source: scalar.source })
    }
  }
  return found
}

/** Trigger and replace as written in the file, so `1.50` stays `1.50` rather than the number 1.5. */
const withSourceText = (item: unknown, node: unknown): unknown => {
  const found = sourceScalars(node)
  if (found.length === 0 || typeof item !== 'object' || item === null || Array.isArray(item)) return item
  return { ...item, ...Object.fromEntries(found.map(({ key, source }) => [key, source])) }
}

const parseSnippetFile = (path: string, text: string): ParsedFile => {
  const doc = parseDocument(text)
  if (doc.errors.length > 0) {
    throw new Error(doc.errors[0].message)
  }
  const data: unknown = doc.toJS()
  if (data === null || data === undefined) {
    return { path, matches: [], passthrough: [] }
  }
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new Error('Top-level content is not a mapping')
  }
  const items: unknown = MATCHES_KEY in data ? data[MATCHES_KEY] : []
  if (items === null || items === undefined) {
    return { path, matches: [], passthrough: [] }
  }
  if (!Array.isArray(items)) {
    throw new Error(`Invalid ${MATCHES_KEY} format`)
  }
  const node = doc.get(MATCHES_KEY, true)
  const nodes = isSeq(node) ? node.items : []
  const matches: Match[] = []
  const passthrough: unknown[] = []
  for (const [index, item] of items.entries()) {
    const match = matchFromYaml(withSourceText(item, nodes[index]))
    if (match) {
      matches.push(match)
    } else {
      passthrough.push(item)
    }
  }
  return { path, matches, passthrough }
}

export const loadDirectory = async (root: string): Promise<LoadResult> => {
  if (!root || !(await isDirectory(root))) {
    return { files: [], errors: [{ path: root, message: MSG_INVALID_FOLDER }] }
  }

  const errors: LoadError[] = []
  const paths: string[] = []
  await collectYamlFiles(root, paths, errors)

  const files: LoadedFile[] = []
  const usedNames = new Set<string>()
  for (const path of paths) {
    let parsed: ParsedFile
    try {
      parsed = parseSnippetFile(path, await readText(path))
    } catch (err) {
      console.warn('Skipping snippet file', path, err)
      errors.push({ path, message: getErrorMessage(err) })
      continue
    }
    if (parsed.matches.length === 0) continue

    let displayName = displayNameFor(path)
    if (usedNames.has(displayName)) {
      displayName = relativeDisplayName(root, path)
    }
    usedNames.add(displayName)
    files.push({ ...parsed, displayName })
  }

  console.info(`Loaded ${files.length} snippet files from ${root}`)
  return { files, errors }
}

type YamlDocument = ReturnType<typeof parseDocument>

const readExistingDocument = async (path: string): Promise<YamlDocument | null> => {
  let text: string
  try {
    text = await readText(path)
  } catch (err) {
    if (getErrorCode(err) !== 'ENOENT') {
      console.warn('Could not read existing file, writing matches only', path, err)
    }
    return null
  }
  const doc = parseDocument(text)
  if (doc.errors.length > 0 || !isMap(doc.contents)) return null
  return doc
}

// A string value keeps the text; the serializer quotes it where it would read as a number.
const pinSourceText = (node: unknown) => {
  for (const { scalar, source } of sourceScalars(node)) {
    scalar.value = source
  }
}

// Reuses untouched item nodes from the current document so their comments survive.
const buildMatchesNode = (doc: YamlDocument, items: unknown[]) => {
  const previous = doc.get(MATCHES_KEY, true)
  const existing = isSeq(previous) ? [...previous.items] : []
  const seq = new YAMLSeq(doc.schema)
  for (const item of items) {
    const idx = existing.findIndex(
      (node) => node !== null && isMap(node) && isDeepStrictEqual(withSourceText(node.toJSON(), node), item),
    )
    if (idx >= 0) {
      pinSourceText(existing[idx])
      seq.items.push(existing[idx])
      existing.splice(idx, 1)
    } else {
      seq.items.push(doc.createNode(item))
    }
  }
  return seq
}

export const serializeSnippetFile = (
  doc: YamlDocument | null,
  matches: readonly Match[],
  passthrough: readonly unknown[],
) => {
  const items = [...matches.map(matchToYaml), ...passthrough]
  if (!doc) {
    return new Document({ [MATCHES_KEY]: items }).toString({ lineWidth: 0 })
  }
  doc.set(MATCHES_KEY, buildMatchesNode(doc, items))
  return doc.toString({ lineWidth: 0 })
}

export const saveFile = async (
  path: string,
  matches: readonly Match[],
  passthrough: readonly unknown[] = [],
): Promise<WriteResult> => {
  try {
    const doc = await readExistingDocument(path)
    await writeText(path, serializeSnippetFile(doc, matches, passthrough))
    console.info(`Saved ${matches.length} snippets to ${path}`)
    return { ok: true }
  } catch (err) {
    console.error('Failed to save', path, err)
    return { ok: false, error: describeFsError(err) }
  }
}

export type CreateFileResult = { ok: true; path: string } | { ok: false; error: string }

export const validateFileName = (name: string): string | null => {
  const trimmed = name.trim()
  if (!trimmed) return ERROR_FILE_NAME_EMPTY
  if (/[\\/:*?"<>|]/.test(trimmed) || trimmed === '.' || trimmed === '..') {
    return ERROR_FILE_NAME_INVALID_CHARS
  }
  if (/\.ya?ml$/i.test(trimmed)) return ERROR_FILE_NO_EXTENSION
  if (trimmed.startsWith('_')) return ERROR_FILE_NAME_UNDERSCORE
  return null
}

export const createFile = async (root: string, name: string): Promise<CreateFileResult> => {
  const invalid = validateFileName(name)
  if (invalid) return { ok: false, error: invalid }
  const fileName = `${name.trim()}.yml`
  const path = join(root, fileName)
  // `<name>.yaml` would show under the same name.
  for (const existing of [fileName, `${name.trim()}.yaml`]) {
    if (await pathExists(join(root, existing))) return { ok: false, error: fileExists(existing) }
  }
  try {
    await writeText(path, new Document({ [MATCHES_KEY]: [] }).toString())
    return { ok: true, path }
  } catch (err) {
    console.error('Failed to create file', path, err)
    return { ok: false, error: describeFsError(err) }
  }
}

export const deleteFile = async (path: string): Promise<WriteResult> => {
  try {
    await removeFile(path)
    return { ok: true }
  } catch (err) {
    console.error('Failed to delete', path, err)
    return { ok: false, error: describeFsError(err) }
  }
}
