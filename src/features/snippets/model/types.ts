export type MatchExtra = readonly [key: string, value: unknown]

export type Match = {
  readonly id: string
  readonly trigger: string
  readonly replace: string
  readonly extras: readonly MatchExtra[]
}

export type FileEntry = {
  path: string
  displayName: string
  matches: readonly Match[]
  /** Items of the `matches` sequence that are not trigger/replace mappings, written back as-is. */
  passthrough: readonly unknown[]
  dirty: boolean
  savedRevision: number
}

export type DisplayRow = {
  id: string
  trigger: string
  replace: string
  replacePreview: string
  complex: boolean
  editable: boolean
}

export type EditField = 'trigger' | 'replace'

export type Snapshot = {
  readonly path: string
  readonly matches: readonly Match[]
  readonly dirty: boolean
  readonly anyDirty: boolean
  readonly savedRevision: number
  readonly description: string
}

export type LoadedFile = {
  path: string
  displayName: string
  matches: Match[]
  passthrough: unknown[]
}

export type LoadError = {
  path: string
  message: string
}

export type LoadResult = {
  files: LoadedFile[]
  errors: LoadError[]
}

export type WriteResult = { ok: true } | { ok: false; error: string }

export type SaveSummary = {
  saved: string[]
  failed: { path: string; error: string }[]
}

export type EditRejection = 'no-file' | 'not-found' | 'complex' | 'duplicate' | 'empty-trigger'

export type EditOutcome =
  | { status: 'applied'; match: Match }
  | { status: 'unchanged' }
  | { status: 'rejected'; reason: EditRejection; revertTo: string | null; message: string | null }

export type AddOutcome =
  | { ok: true; match: Match }
  | { ok: false; reason: 'no-file' | 'duplicate' | 'empty-trigger'; message: string }
