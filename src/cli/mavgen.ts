#!/usr/bin/env node
import { Stats } from 'fs'
import { mkdir, readdir, stat, writeFile } from 'fs/promises'
import path from 'path'
import { Command } from 'commander'
import { dialectNameOf, readDialectDefinition } from '../dialect'
import { TemplateEngine } from '../generator/template-engine'
import { LogSink, StructuredLogger, stderrSink } from '../logger'
import { reportFailure } from './options'

export interface MavgenOptions {
  /** Target file for one definition, target directory for several. */
  output: string
  runtimeImport?: string
}

/** Undefined when nothing exists at `file`. */
async function statOf(file: string): Promise<Stats | undefined> {
  try {
    return await stat(file)
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined
    }
    throw error
  }
}

async function isDirectory(file: string): Promise<boolean> {
  return (await statOf(file))?.isDirectory() ?? false
}

/**
 * Expand directories among `inputs` to the `.xml` definitions directly inside them
 */
export async function resolveDefinitions(inputs: readonly string[]): Promise<string[]> {
  const definitions: string[] = []
  for (const input of inputs) {
    if (!(await isDirectory(input))) {
      definitions.push(input)
      continue
    }
    const entries = await readdir(input, { withFileTypes: true })
    definitions.push(
      ...entries
        .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === '.xml')
        .map((entry) => path.join(input, entry.name))
        .sort()
    )
  }
  return definitions
}

/**
 * Render the dialect module for one XML definition and write it to `output`.
 * Returns the absolute path written.
 */
export async function generateDialectFile(definitionPath: string, options: MavgenOptions): Promise<string> {
  const definition = await readDialectDefinition(definitionPath)
  const source = new TemplateEngine().generateDialectModule(dialectNameOf(definitionPath), definition, {
    runtimeImport: options.runtimeImport,
  })

  const target = path.resolve(options.output)
  await mkdir(path.dirname(target), { recursive: true })
  await writeFile(target, source, 'utf8')
  return target
}

/**
 * Write one `<dialect>.ts` per definition into the `output` directory.
 * Returns the absolute paths written, in input order.
 */
export async function generateDialectTree(
  definitionPaths: readonly string[],
  options: MavgenOptions
): Promise<string[]> {
  const directory = path.resolve(options.output)
  const existing = await statOf(directory)
  if (existing && !existing.isDirectory()) {
    throw new Error(`for several definitions the output must be a directory, ${directory} is a file`)
  }

  const targets = new Map<string, string>()
  for (const definitionPath of definitionPaths) {
    const target = path.join(directory, `${dialectNameOf(definitionPath)}.ts`)
    const previous = targets.get(target)
    if (previous !== undefined) {
      throw new Error(`${previous} and ${definitionPath} would both be written to ${target}`)
    }
    targets.set(target, definitionPath)
  }

  const written: string[] = []
  for (const [target, definitionPath] of targets) {
    written.push(await generateDialectFile(definitionPath, { ...options, output: target }))
  }
  return written
}

/**
 * One file in, one module out; anything else generates a directory of modules
 */
export async function generate(inputs: readonly string[], options: MavgenOptions): Promise<string[]> {
  if (inputs.length === 1 && !(await isDirectory(inputs[0]))) {
    return [await generateDialectFile(inputs[0], options)]
  }
  const definitions = await resolveDefinitions(inputs)
  if (definitions.length === 0) {
    throw new Error(`no .xml definitions found in ${inputs.join(', ')}`)
  }
  return generateDialectTree(definitions, options)
}

function createProgram(sink: LogSink): Command {
  const logger = new StructuredLogger(sink, 'MAVGEN')
  const program = new Command()
  program
    .name('mavgen')
    .description('Generate typed TypeScript modules from MAVLink dialect definitions')
    .argument('<definitions...>', 'Dialect XML definitions, or directories holding them')
    .requiredOption('-o, --output <path>', 'TypeScript file to write, or a directory for several definitions')
    .option('--runtime-import <module>', 'Module the generated code imports the runtime from')
    .exitOverride()
    .configureOutput({
      writeErr: (text) => sink.write(text.trimEnd()),
    })
    .action(async (definitions: string[]) => {
      for (const target of await generate(definitions, program.opts<MavgenOptions>())) {
        logger.info(`wrote ${target}`)
      }
    })
  return program
}

/**
 * Run the CLI and return the process exit code
 */
export async function main(argv: readonly string[] = process.argv, sink: LogSink = stderrSink): Promise<number> {
  try {
    await createProgram(sink).parseAsync(argv)
    return 0
  } catch (error) {
    return reportFailure(error, sink)
  }
}

if (require.main === module) {
  void main().then((code) => {
    process.exitCode = code
  })
}
