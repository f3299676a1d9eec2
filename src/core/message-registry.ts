// Message registry - stores and retrieves message definitions
import { MessageDefinition, IMessageRegistry } from './types'
import { computeCrcExtra } from './crc'

/**
 * Registry for MAVLink message definitions.
 * Provides O(1) lookup by both ID and name.
 */
export class MessageRegistry implements IMessageRegistry {
  private definitionsById: Map<number, MessageDefinition> = new Map()
  private definitionsByName: Map<string, MessageDefinition> = new Map()
  private crcExtraTable: Record<number, number> = {}

  /**
   * Build a registry, deriving each CRC_EXTRA from its definition
   */
  static fromDefinitions(definitions: readonly MessageDefinition[]): MessageRegistry {
    const registry = new MessageRegistry()
    for (const def of definitions) {
      registry.register(def, computeCrcExtra(def))
    }
    return registry
  }

  /**
   * Register a message definition. Id and name must both be new.
   */
  register(def: MessageDefinition, crcExtra: number): void {
    const byId = this.definitionsById.get(def.id)
    if (byId) {
      throw new Error(`Message ID ${def.id} already registered as ${byId.name}`)
    }
    if (this.definitionsByName.has(def.name)) {
      throw new Error(`Message ${def.name} already registered`)
    }
    this.definitionsById.set(def.id, def)
    this.definitionsByName.set(def.name, def)
    this.crcExtraTable[def.id] = crcExtra
  }

  getCrcExtra(messageId: number): number | undefined {
    return this.crcExtraTable[messageId]
  }

  getCrcExtraTable(): Readonly<Record<number, number>> {
    return this.crcExtraTable
  }

  getMessageDefinition(id: number): MessageDefinition | undefined {
    return this.definitionsById.get(id)
  }

  getMessageDefinitionByName(name: string): MessageDefinition | undefined {
    return this.definitionsByName.get(name)
  }

  supportsMessage(messageId: number): boolean {
    return this.definitionsById.has(messageId)
  }

  supportsMessageName(messageName: string): boolean {
    return this.definitionsByName.has(messageName)
  }

  /**
   * All supported message IDs, ascending
   */
  getSupportedMessageIds(): number[] {
    return Array.from(this.definitionsById.keys()).sort((a, b) => a - b)
  }

  /**
   * All supported message names, in registration order
   */
  getSupportedMessageNames(): string[] {
    return Array.from(this.definitionsByName.keys())
  }
}
