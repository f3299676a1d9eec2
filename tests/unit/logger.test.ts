import { describe, it, expect } from '@jest/globals'
import { LogLevel, StructuredLogger } from '../../src/logger'

function capture(): { lines: string[]; write: (line: string) => void } {
  const lines: string[] = []
  return { lines, write: (line) => lines.push(line) }
}

describe('StructuredLogger', () => {
  it('prefixes lines with level and component', () => {
    const sink = capture()
    const logger = new StructuredLogger(sink, 'SESSION')

    logger.info('ready')
    logger.warn('slow')
    logger.error('gone')

    expect(sink.lines).toEqual(['[info] [SESSION] ready', '[warn] [SESSION] slow', '[error] [SESSION] gone'])
  })

  it('drops lines below the minimum level', () => {
    const sink = capture()
    const logger = new StructuredLogger(sink, 'SESSION', LogLevel.WARN)

    logger.debug('a')
    logger.info('b')
    logger.warn('c')

    expect(sink.lines).toEqual(['[warn] [SESSION] c'])
  })

  it('shares sink and level with its children', () => {
    const sink = capture()
    const child = new StructuredLogger(sink, 'HARNESS', LogLevel.DEBUG).child('SERVER')

    child.debug('spawned')
    expect(sink.lines).toEqual(['[debug] [SERVER] spawned'])
  })
})
