export * from './errors'
export * from './factory'
export * from './registry'
export * from './retry'
