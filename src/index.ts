export * from './features/snippets'
export * from './features/shortcuts'
