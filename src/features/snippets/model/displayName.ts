import { basename, dirname, extname, relative } from 'node:path'

export const PACKAGE_FILE_NAME = 'package.yml'

export const isPackageFile = (path: string) => basename(path) === PACKAGE_FILE_NAME

export const displayNameFor = (path: string) => {
  const name = basename(path)
  if (name === PACKAGE_FILE_NAME) {
    return `${basename(dirname(path))} (package)`
  }
  return name.slice(0, name.length - extname(name).length)
}

/** Fallback label when two files share a display name: the root-relative path without extension. */
export const relativeDisplayName = (root: string, path: string) => {
  const rel = relative(root, path).split('\\').join('/')
  return rel.slice(0, rel.length - extname(rel).length)
}
