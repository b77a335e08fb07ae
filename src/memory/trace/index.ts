export * from './trace-register.js'
