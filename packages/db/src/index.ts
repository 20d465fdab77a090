export * from './types.js'
export * from './errors.js'
export * from './retry.js'
export * from './client.js'
export * from './catalog-repository.js'
