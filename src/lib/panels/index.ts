export * from './types'
export * from './pivot'
export * from './indicator-panel'
export * from './trade-balance'
export * from './dashboard'
