export * from './core'
export * from './dialect'
export * from './harness'
export * from './config'
export * from './errors'
export * from './logger'
export { TemplateEngine } from './generator/template-engine'
