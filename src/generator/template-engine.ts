import Handlebars from 'handlebars'
import { RawDialectDefinition, RawFieldDefinition, buildDialectSchema } from '../dialect'

export interface GenerateOptions {
  /** Module the generated code imports the runtime from. */
  runtimeImport?: string
}

interface FieldView {
  name: string
  tsType: string
}

interface MessageView {
  id: number
  name: string
  crcExtra: number
  fields: FieldView[]
  definition: string
}

interface DialectView {
  dialectName: string
  runtimeImport: string
  messages: MessageView[]
  enums: string
}

const SCALAR_TS_TYPES: Record<string, string> = {
  uint64_t: 'bigint',
  int64_t: 'bigint',
  char: 'string',
}

/**
 * GPS_RAW_INT -> GpsRawInt
 */
export function toPascalCase(name: string): string {
  return name
    .toLowerCase()
    .split(/[_\s]+/)
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('')
}

export function tsTypeOf(field: RawFieldDefinition): string {
  const scalar = SCALAR_TS_TYPES[field.type] ?? 'number'
  if (!field.arrayLength) {
    return scalar
  }
  return field.type === 'char' ? 'string' : `${scalar}[]`
}

export class TemplateEngine {
  private templates: Map<string, HandlebarsTemplateDelegate> = new Map()
  private readonly handlebars = Handlebars.create()

  constructor() {
    this.registerHelpers()
    this.initializeTemplates()
  }

  private initializeTemplates(): void {
    this.templates.set(
      'dialect',
      this.handlebars.compile(
        `// Auto-generated dialect module for {{{ dialectName }}}
// Generated from MAVLink XML definitions

import {
  MessageDescriptor,
  MessageInstance,
  RawDialectDefinition,
  buildDialectSchema,
  buildMessage,
} from '{{{ runtimeImport }}}'

export const DIALECT_NAME = '{{{ dialectName }}}'

// CRC_EXTRA values for each message type
export const CRC_EXTRA: Record<number, number> = {
{{#each messages}}
  {{ id }}: {{ crcExtra }},
{{/each}}
}

export const DIALECT_DEFINITION: RawDialectDefinition = {
  messages: [
{{#each messages}}
    {{{ definition }}},
{{/each}}
  ],
  enums: {{{ enums }}},
}

export const dialect = buildDialectSchema(DIALECT_NAME, DIALECT_DEFINITION)

function descriptorOf(name: string): MessageDescriptor {
  const descriptor = dialect.getMessage(name)
  if (!descriptor) {
    throw new Error(\`Unknown message type: \${name}\`)
  }
  return descriptor
}
{{#each messages}}

// {{{ name }}} (#{{ id }})
export type {{pascalCase name}}Fields = {
{{#each fields}}
  {{{ name }}}: {{{ tsType }}}
{{/each}}
}

export function build{{pascalCase name}}(fields: {{pascalCase name}}Fields): MessageInstance {
  return buildMessage(descriptorOf('{{{ name }}}'), fields)
}
{{/each}}
`,
        { noEscape: true }
      )
    )
  }

  private registerHelpers(): void {
    this.handlebars.registerHelper('pascalCase', (str: string) => toPascalCase(str))
  }

  private buildView(name: string, raw: RawDialectDefinition, options: GenerateOptions): DialectView {
    const schema = buildDialectSchema(name, raw)

    const messages = raw.messages.map((message): MessageView => {
      const descriptor = schema.getMessage(message.name)
      if (!descriptor) {
        throw new Error(`Message ${message.name} missing from schema`)
      }
      return {
        id: message.id,
        name: message.name,
        crcExtra: descriptor.crcExtra,
        fields: message.fields.map((field) => ({ name: field.name, tsType: tsTypeOf(field) })),
        definition: JSON.stringify(message),
      }
    })

    return {
      dialectName: name,
      runtimeImport: options.runtimeImport ?? 'mavlink-roundtrip',
      messages,
      enums: JSON.stringify(raw.enums),
    }
  }

  /**
   * Render a TypeScript module holding the dialect's message descriptors
   * and one typed builder per message type
   */
  generateDialectModule(
    name: string,
    raw: RawDialectDefinition,
    options: GenerateOptions = {}
  ): string {
    const template = this.templates.get('dialect')
    if (!template) {
      throw new Error('Dialect template not found')
    }
    return template(this.buildView(name, raw, options))
  }
}
