export type NormalizedError = Error & {
  code?: string
  path?: string
  raw?: unknown
}

type ErrorLike = {
  code?: unknown
  message?: unknown
  path?: unknown
}

const asRecord = (value: unknown): Record<string, unknown> | null => {
  if (value && typeof value === 'object') return value as Record<string, unknown>
  return null
}

const asErrorLike = (value: unknown): ErrorLike | null => {
  const record = asRecord(value)
  if (!record) return null
  return {
    code: record.code,
    message: record.message,
    path: record.path,
  }
}

// Node's fs errors are real Errors that already carry `code` and `path`.
export const normalizeError = (value: unknown): NormalizedError => {
  if (value instanceof Error) {
    return value
  }

  const like = asErrorLike(value)
  const message =
    typeof like?.message === 'string'
      ? like.message
      : typeof value === 'string'
        ? value
        : (() => {
            try {
              return JSON.stringify(value)
            } catch {
              return String(value)
            }
          })()

  const error: NormalizedError = new Error(message || 'Unknown error')
  if (typeof like?.code === 'string') error.code = like.code
  if (typeof like?.path === 'string') error.path = like.path
  error.raw = value
  return error
}

export const getErrorMessage = (value: unknown): string => normalizeError(value).message
export const getErrorCode = (value: unknown): string | undefined => normalizeError(value).code

const FS_ERROR_TEXT: Record<string, string> = {
  ENOENT: 'File or folder not found',
  EACCES: 'Permission denied',
  EPERM: 'Operation not permitted',
  EISDIR: 'Path is a folder',
  ENOTDIR: 'Path is not a folder',
  ENOSPC: 'No space left on device',
  EEXIST: 'File already exists',
  EROFS: 'File system is read-only',
}

export const describeFsError = (value: unknown): string => {
  const error = normalizeError(value)
  const text = error.code ? FS_ERROR_TEXT[error.code] : undefined
  if (!text) return error.message
  return error.path ? `${text}: ${error.path}` : text
}
