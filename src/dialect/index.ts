export * from './schema'
export * from './codec'
export {
  loadDialect,
  readDialectDefinition,
  dialectNameOf,
  parseEnumValue,
  parseFieldType,
} from './xml-loader'
