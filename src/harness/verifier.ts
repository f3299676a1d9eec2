import { isDeepStrictEqual } from 'util'
import { ParsedMAVLinkMessage } from '../core'
import { DialectSchema, MessageDescriptor, MessageInstance } from '../dialect'
import { ContentMismatchError, ReceiveTimeoutError } from '../errors'
import { StructuredLogger, silentLogger } from '../logger'
import { CanonicalMessage, toCanonical } from './canonical'
import { MessageChannel } from './connection'
import { synthesizeMessage } from './message-synthesizer'
import { RandomSource, mathRandom } from './random'

export interface VerifierOptions {
  receiveTimeoutMs: number
  random?: RandomSource
  logger?: StructuredLogger
}

export interface VerificationResult {
  messageName: string
  canonical: CanonicalMessage
}

/**
 * Encode `message` and decode the bytes again with a fresh parser
 */
export function decodeLocally(schema: DialectSchema, message: MessageInstance): ParsedMAVLinkMessage {
  const decoded = schema.codec.decode(schema.codec.encode(message.name, message.fields))
  if (decoded.length !== 1) {
    throw new Error(`local decode of ${message.name} yielded ${decoded.length} messages`)
  }
  return decoded[0]
}

/**
 * Send one random message of the given type and check the echo matches
 * the locally decoded original.
 */
export async function verifyRoundTrip(
  schema: DialectSchema,
  channel: MessageChannel,
  descriptor: MessageDescriptor,
  options: VerifierOptions
): Promise<VerificationResult> {
  const logger = options.logger ?? silentLogger
  const message = synthesizeMessage(schema, descriptor, options.random ?? mathRandom)

  await channel.send(message)
  logger.info(`SENT ${descriptor.name}`)

  const response = await channel.recv(options.receiveTimeoutMs)
  if (!response) {
    throw new ReceiveTimeoutError(descriptor.name, options.receiveTimeoutMs)
  }
  logger.info(`RECEIVED ${response.message_name}`)

  const expected = toCanonical(decodeLocally(schema, message))
  const received = toCanonical(response)

  if (!response.crc_ok) {
    throw new ContentMismatchError(descriptor.name, expected, received, 'echoed frame failed its CRC check')
  }
  if (!isDeepStrictEqual(expected, received)) {
    throw new ContentMismatchError(descriptor.name, expected, received)
  }

  return { messageName: descriptor.name, canonical: expected }
}

/**
 * Verify every message type of the dialect in schema order, stopping at the first failure
 */
export async function verifyAll(
  schema: DialectSchema,
  channel: MessageChannel,
  options: VerifierOptions
): Promise<string[]> {
  const verified: string[] = []
  for (const descriptor of schema.messages) {
    const result = await verifyRoundTrip(schema, channel, descriptor, options)
    verified.push(result.messageName)
  }
  return verified
}
