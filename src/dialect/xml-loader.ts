// Loads a MAVLink XML definition, following <include> files, into a DialectSchema
import { readFile } from 'fs/promises'
import path from 'path'
import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { DialectError, errorMessage } from '../errors'
import {
  DialectSchema,
  RawDialectDefinition,
  RawEnumDefinition,
  RawEnumEntry,
  RawFieldDefinition,
  RawMessageDefinition,
  buildDialectSchema,
} from './schema'

type XmlNode = Record<string, unknown>

const ATTRIBUTES_KEY = ':@'
const TEXT_KEY = '#text'

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
})

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function tagOf(node: XmlNode): string | undefined {
  return Object.keys(node).find((key) => key !== ATTRIBUTES_KEY)
}

function childrenOf(node: XmlNode): XmlNode[] {
  const tag = tagOf(node)
  const children = tag === undefined ? undefined : node[tag]
  return Array.isArray(children) ? children.filter(isNode) : []
}

function childrenNamed(node: XmlNode, tag: string): XmlNode[] {
  return childrenOf(node).filter((child) => tagOf(child) === tag)
}

function attribute(node: XmlNode, name: string): string | undefined {
  const attributes = node[ATTRIBUTES_KEY]
  if (!isNode(attributes)) {
    return undefined
  }
  const value = attributes[name]
  return typeof value === 'string' ? value : undefined
}

function textOf(node: XmlNode): string {
  return childrenOf(node)
    .map((child) => child[TEXT_KEY])
    .filter((text): text is string | number => typeof text === 'string' || typeof text === 'number')
    .join('')
    .trim()
}

/**
 * Parse an enum entry value: decimal, hex (0x..) or power form (2**n).
 * An entry without a value follows the previous one. Values must be safe
 * integers, since enum options are carried as numbers.
 */
export function parseEnumValue(text: string | undefined, previous: number | undefined): number {
  if (text === undefined || text.trim() === '') {
    return requireSafe((previous ?? -1) + 1, `${previous ?? -1} + 1`)
  }
  const value = text.trim()
  if (/^0x[0-9a-f]+$/i.test(value)) {
    return requireSafe(parseInt(value.slice(2), 16), value)
  }
  const power = /^(\d+)\s*\*\*\s*(\d+)$/.exec(value)
  if (power) {
    return requireSafe(Math.pow(Number(power[1]), Number(power[2])), value)
  }
  if (/^-?\d+$/.test(value)) {
    return requireSafe(Number(value), value)
  }
  throw new DialectError(`invalid enum value "${value}"`)
}

function requireSafe(value: number, source: string): number {
  if (!Number.isSafeInteger(value)) {
    throw new DialectError(`enum value ${source} is out of the safe integer range`)
  }
  return value
}

/**
 * Split `char[16]` into its element type and length
 */
export function parseFieldType(type: string): { type: string; arrayLength?: number } {
  const match = /^([a-z0-9_]+)\[(\d+)\]$/i.exec(type.trim())
  if (!match) {
    return { type: type.trim() }
  }
  return { type: match[1], arrayLength: Number(match[2]) }
}

function requireAttribute(node: XmlNode, name: string, file: string): string {
  const value = attribute(node, name)
  if (value === undefined || value === '') {
    throw new DialectError(`<${tagOf(node) ?? '?'}> without "${name}" attribute`, file)
  }
  return value
}

function readMessage(node: XmlNode, file: string): RawMessageDefinition {
  const name = requireAttribute(node, 'name', file)
  const id = Number(requireAttribute(node, 'id', file))
  if (!Number.isInteger(id) || id < 0 || id > 0xffffff) {
    throw new DialectError(`message ${name} has invalid id`, file)
  }

  const fields: RawFieldDefinition[] = []
  let extension = false
  for (const child of childrenOf(node)) {
    const tag = tagOf(child)
    if (tag === 'extensions') {
      extension = true
    } else if (tag === 'field') {
      const fieldName = requireAttribute(child, 'name', file)
      const { type, arrayLength } = parseFieldType(requireAttribute(child, 'type', file))
      const enumName = attribute(child, 'enum')
      fields.push({
        name: fieldName,
        type,
        ...(arrayLength !== undefined ? { arrayLength } : {}),
        ...(enumName ? { enumName } : {}),
        ...(extension ? { extension } : {}),
      })
    }
  }

  return { id, name, fields }
}

function readEnum(node: XmlNode, file: string): RawEnumDefinition {
  const name = requireAttribute(node, 'name', file)
  const entries: RawEnumEntry[] = []
  let previous: number | undefined
  for (const entry of childrenNamed(node, 'entry')) {
    let value: number
    try {
      value = parseEnumValue(attribute(entry, 'value'), previous)
    } catch (error) {
      throw new DialectError(`enum ${name}: ${errorMessage(error)}`, file, { cause: error })
    }
    entries.push({ name: requireAttribute(entry, 'name', file), value })
    previous = value
  }
  return { name, bitmask: attribute(node, 'bitmask') === 'true', entries }
}

class DefinitionCollector implements RawDialectDefinition {
  readonly messages: RawMessageDefinition[] = []
  readonly enums: RawEnumDefinition[] = []
  private readonly enumIndex = new Map<string, RawEnumDefinition>()
  private readonly visited = new Set<string>()

  async collect(file: string): Promise<void> {
    const resolved = path.resolve(file)
    if (this.visited.has(resolved)) {
      return
    }
    this.visited.add(resolved)

    const root = await parseDefinitionFile(resolved)
    for (const include of childrenNamed(root, 'include')) {
      await this.collect(path.resolve(path.dirname(resolved), textOf(include)))
    }

    for (const enums of childrenNamed(root, 'enums')) {
      for (const node of childrenNamed(enums, 'enum')) {
        this.addEnum(readEnum(node, resolved))
      }
    }
    for (const messages of childrenNamed(root, 'messages')) {
      for (const node of childrenNamed(messages, 'message')) {
        this.messages.push(readMessage(node, resolved))
      }
    }
  }

  // Enums of the same name extend each other across included files
  private addEnum(enumDef: RawEnumDefinition): void {
    const existing = this.enumIndex.get(enumDef.name)
    if (existing) {
      existing.entries.push(...enumDef.entries)
      return
    }
    this.enumIndex.set(enumDef.name, enumDef)
    this.enums.push(enumDef)
  }
}

async function parseDefinitionFile(file: string): Promise<XmlNode> {
  let xml: string
  try {
    xml = await readFile(file, 'utf8')
  } catch (error) {
    throw new DialectError(`cannot read definition: ${errorMessage(error)}`, file, {
      cause: error,
    })
  }

  const validation = XMLValidator.validate(xml)
  if (validation !== true) {
    const { msg, line } = validation.err
    throw new DialectError(`malformed XML at line ${line}: ${msg}`, file)
  }

  const document: unknown = parser.parse(xml)
  const root = Array.isArray(document)
    ? document.filter(isNode).find((node) => tagOf(node) === 'mavlink')
    : undefined
  if (!root) {
    throw new DialectError('missing <mavlink> root element', file)
  }
  return root
}

/**
 * Dialect name used on the wire and on the server's command line
 */
export function dialectNameOf(file: string): string {
  return path.basename(file, path.extname(file)).toLowerCase()
}

/**
 * Read an XML dialect definition and everything it includes, flattened:
 * included files come first, same-named enums are merged
 */
export async function readDialectDefinition(file: string): Promise<RawDialectDefinition> {
  const collector = new DefinitionCollector()
  await collector.collect(file)
  return { messages: collector.messages, enums: collector.enums }
}

/**
 * Read an XML dialect definition (and its includes) into a frozen schema
 */
export async function loadDialect(file: string): Promise<DialectSchema> {
  const definition = await readDialectDefinition(file)
  try {
    return buildDialectSchema(dialectNameOf(file), definition)
  } catch (error) {
    if (error instanceof DialectError) {
      throw new DialectError(error.message, path.resolve(file), { cause: error })
    }
    throw error
  }
}
