export * from './schemas.js'
export * from './components.js'
