export * from './constants'
export * from './vec'
export * from './random'
export * from './entities'
export * from './session'
export * from './layout'
export * from './speed'
export * from './collision'
export * from './bonus'
export * from './engine'
