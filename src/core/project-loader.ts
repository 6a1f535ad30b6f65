import {readFile, stat} from 'node:fs/promises'
import {basename, dirname, extname, isAbsolute, join, resolve} from 'node:path'
import {deburr} from 'lodash-es'
import {parse as parseYaml} from 'yaml'
import {ValidationError} from '../errors.js'
import type {Pipeline, Project, ReadinessProbe, ServiceSpec, Target, TargetInput, TestSuite} from '../types.js'

/** File names searched, in order, when a directory is given. */
export const projectFileNames = ['rigger.yaml', 'rigger.yml', 'rigger.json']

type Fields = Record<string, unknown>

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Resolves a project file from a file or directory path.
 * A directory is searched for the first of `projectFileNames`.
 */
export async function resolveProjectFile(path: string): Promise<string> {
  const absolute = resolve(path)
  const info = await stat(absolute).catch(() => undefined)

  if (info?.isFile()) {
    return absolute
  }

  if (info?.isDirectory()) {
    for (const name of projectFileNames) {
      const candidate = join(absolute, name)
      // eslint-disable-next-line no-await-in-loop
      const found = await stat(candidate).catch(() => undefined)
      if (found?.isFile()) {
        return candidate
      }
    }

    throw new ValidationError(`No project file found in ${absolute} (looked for ${projectFileNames.join(', ')})`)
  }

  throw new ValidationError(`Project file not found: ${absolute}`)
}

export class ProjectLoader {
  async load(filePath: string): Promise<Project> {
    const content = await readFile(filePath, 'utf8')
    return this.parse(content, filePath)
  }

  parse(content: string, filePath: string): Project {
    let input: unknown
    try {
      input = parseProjectFile(content, filePath)
    } catch (error) {
      throw new ValidationError(`Invalid project file ${filePath}: ${error instanceof Error ? error.message : String(error)}`, {cause: error})
    }

    if (!isRecord(input)) {
      throw new ValidationError('Invalid project: expected a mapping at the top level')
    }

    const root = dirname(resolve(filePath))
    const name = optionalString(input.name, 'project name')
    const id = optionalString(input.id, 'project id') ?? slugify(name ?? basename(root))
    this.validateIdentifier(id, 'project id')

    const targets = list(input.targets, 'targets').map((entry, index) => this.resolveTarget(entry, index))
    const services = list(input.services, 'services').map((entry, index) => this.resolveService(entry, index))
    const suites = list(input.suites, 'suites').map((entry, index) => this.resolveSuite(entry, index))
    const clean = stringList(input.clean, 'clean')
    for (const path of clean) {
      this.validateRelativePath(path, 'clean path')
    }

    this.validateUniqueIds(targets, 'target')
    this.validateUniqueIds(services, 'service')
    this.validateUniqueIds(suites, 'suite')

    const pipelines = this.resolvePipelines(input.pipelines)
    this.validateReferences(pipelines, {
      target: new Set(targets.map(t => t.id)),
      service: new Set(services.map(s => s.id)),
      suite: new Set(suites.map(s => s.id))
    })

    return {id, name, root, clean, targets, services, suites, pipelines}
  }

  private resolveTarget(entry: unknown, index: number): Target {
    const fields = record(entry, `targets[${index}]`)
    const {id, name} = this.resolveId(fields, `targets[${index}]`)
    const context = `target ${id}`

    const inputs = list(fields.inputs, `${context}: inputs`).map((input): TargetInput => {
      if (typeof input === 'string') {
        this.validateRelativePath(input, `input of ${context}`)
        return {kind: 'file', path: input}
      }

      if (isRecord(input) && typeof input.target === 'string') {
        this.validateIdentifier(input.target, `input target in ${context}`)
        return {kind: 'target', id: input.target}
      }

      throw new ValidationError(`Invalid ${context}: inputs must be paths or {target: <id>} references`)
    })

    const outputs = stringList(fields.outputs, `${context}: outputs`)
    for (const output of outputs) {
      this.validateRelativePath(output, `output of ${context}`)
    }

    const alwaysStale = optionalBoolean(fields.always, `${context}: always`)
    if (outputs.length === 0 && !alwaysStale) {
      throw new ValidationError(`Invalid ${context}: declare outputs or set always: true`)
    }

    return {
      id,
      name,
      inputs,
      outputs,
      cmd: command(fields.cmd, context),
      cwd: this.optionalCwd(fields.cwd, context),
      env: env(fields.env, context),
      alwaysStale
    }
  }

  private resolveService(entry: unknown, index: number): ServiceSpec {
    const fields = record(entry, `services[${index}]`)
    const {id, name} = this.resolveId(fields, `services[${index}]`)
    const context = `service ${id}`

    if (typeof fields.image !== 'string' || fields.image === '') {
      throw new ValidationError(`Invalid ${context}: image is required`)
    }

    return {
      id,
      name,
      image: fields.image,
      env: env(fields.env, context),
      ports: fields.ports === undefined ? undefined : stringList(fields.ports, `${context}: ports`),
      args: fields.args === undefined ? undefined : stringList(fields.args, `${context}: args`),
      readiness: this.resolveReadiness(fields.readiness, context)
    }
  }

  private resolveReadiness(value: unknown, context: string): ReadinessProbe {
    const fields = record(value, `${context}: readiness`)
    const probe: ReadinessProbe = {cmd: command(fields.cmd, `${context} readiness`)}

    for (const key of ['intervalMs', 'timeoutMs', 'maxAttempts', 'attemptTimeoutMs'] as const) {
      const setting = fields[key]
      if (setting === undefined) {
        continue
      }

      if (typeof setting !== 'number' || !Number.isInteger(setting) || setting <= 0) {
        throw new ValidationError(`Invalid ${context}: readiness.${key} must be a positive integer`)
      }

      probe[key] = setting
    }

    return probe
  }

  private resolveSuite(entry: unknown, index: number): TestSuite {
    const fields = record(entry, `suites[${index}]`)
    const {id, name} = this.resolveId(fields, `suites[${index}]`)
    const context = `suite ${id}`

    return {
      id,
      name,
      cmd: command(fields.cmd, context),
      cwd: this.optionalCwd(fields.cwd, context),
      env: env(fields.env, context)
    }
  }

  private resolvePipelines(value: unknown): Pipeline[] {
    if (value === undefined) {
      return []
    }

    const entries = record(value, 'pipelines')
    return Object.entries(entries).map(([id, definition]) => {
      this.validateIdentifier(id, 'pipeline id')
      const context = `pipeline ${id}`
      const fields = definition === null ? {} : record(definition, context)

      const timeoutSec = fields.timeoutSec
      if (timeoutSec !== undefined && (typeof timeoutSec !== 'number' || timeoutSec <= 0)) {
        throw new ValidationError(`Invalid ${context}: timeoutSec must be a positive number`)
      }

      return {
        id,
        name: optionalString(fields.name, `${context}: name`),
        clean: optionalBoolean(fields.clean, `${context}: clean`),
        build: stringList(fields.build, `${context}: build`),
        services: stringList(fields.services, `${context}: services`),
        prepare: list(fields.prepare, `${context}: prepare`).map(cmd => command(cmd, `${context} prepare`)),
        suites: stringList(fields.suites, `${context}: suites`),
        env: env(fields.env, context),
        requireEnv: this.variableNames(fields.requireEnv, `${context}: requireEnv`),
        timeoutSec
      }
    })
  }

  private resolveId(fields: Fields, context: string): {id: string; name?: string} {
    const name = optionalString(fields.name, `${context}: name`)
    const explicit = optionalString(fields.id, `${context}: id`)

    if (!explicit && !name) {
      throw new ValidationError(`Invalid ${context}: at least one of "id" or "name" must be defined`)
    }

    const id = explicit ?? slugify(name ?? '')
    this.validateIdentifier(id, `${context} id`)
    return {id, name}
  }

  private optionalCwd(value: unknown, context: string): string | undefined {
    const cwd = optionalString(value, `${context}: cwd`)
    if (cwd !== undefined) {
      this.validateRelativePath(cwd, `cwd of ${context}`)
    }

    return cwd
  }

  private validateReferences(pipelines: Pipeline[], known: Record<'target' | 'service' | 'suite', Set<string>>): void {
    for (const pipeline of pipelines) {
      const check = (kind: 'target' | 'service' | 'suite', ids: string[]) => {
        for (const ref of ids) {
          if (!known[kind].has(ref)) {
            throw new ValidationError(`Invalid pipeline ${pipeline.id}: unknown ${kind} '${ref}'`)
          }
        }
      }

      check('target', pipeline.build)
      check('service', pipeline.services)
      check('suite', pipeline.suites)
    }
  }

  private validateRelativePath(path: string, context: string): void {
    if (path === '' || isAbsolute(path)) {
      throw new ValidationError(`Invalid ${context}: '${path}' must be a relative path`)
    }

    if (path.split(/[/\\]/).includes('..')) {
      throw new ValidationError(`Invalid ${context}: '${path}' must not contain '..'`)
    }
  }

  private validateIdentifier(id: string, context: string): void {
    if (!/^[\w-]+$/.test(id)) {
      throw new ValidationError(`Invalid ${context}: '${id}' must contain only alphanumeric characters, underscore, and hyphen`)
    }
  }

  private variableNames(value: unknown, context: string): string[] {
    const names = stringList(value, context)
    for (const name of names) {
      if (!/^[A-Za-z_]\w*$/.test(name)) {
        throw new ValidationError(`Invalid ${context}: '${name}' is not an environment variable name`)
      }
    }

    return names
  }

  private validateUniqueIds(entries: Array<{id: string}>, kind: string): void {
    const seen = new Set<string>()
    for (const entry of entries) {
      if (seen.has(entry.id)) {
        throw new ValidationError(`Duplicate ${kind} id: '${entry.id}'`)
      }

      seen.add(entry.id)
    }
  }
}

/** Convert a free-form name into a valid identifier. */
export function slugify(name: string): string {
  return deburr(name)
    .toLowerCase()
    .replaceAll(/[^\w-]/g, '-')
    .replaceAll(/-{2,}/g, '-')
    .replace(/^-/, '')
    .replace(/-$/, '')
}

export function parseProjectFile(content: string, filePath: string): unknown {
  const ext = extname(filePath).toLowerCase()
  if (ext === '.yaml' || ext === '.yml') {
    return parseYaml(content)
  }

  return JSON.parse(content)
}

// -- Field readers ------------------------------------------------------------

function record(value: unknown, context: string): Fields {
  if (!isRecord(value)) {
    throw new ValidationError(`Invalid ${context}: expected a mapping`)
  }

  return value
}

function list(value: unknown, context: string): unknown[] {
  if (value === undefined || value === null) {
    return []
  }

  if (!Array.isArray(value)) {
    throw new ValidationError(`Invalid ${context}: expected a list`)
  }

  return value
}

function stringList(value: unknown, context: string): string[] {
  return list(value, context).map(item => {
    if (typeof item !== 'string') {
      throw new ValidationError(`Invalid ${context}: expected a list of strings`)
    }

    return item
  })
}

function command(value: unknown, context: string): string[] {
  const cmd = stringList(value, `${context}: cmd`)
  if (cmd.length === 0 || cmd[0] === '') {
    throw new ValidationError(`Invalid ${context}: cmd must be a non-empty array`)
  }

  return cmd
}

function optionalString(value: unknown, context: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'string') {
    throw new ValidationError(`Invalid ${context}: expected a string`)
  }

  return value
}

function optionalBoolean(value: unknown, context: string): boolean | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'boolean') {
    throw new ValidationError(`Invalid ${context}: expected true or false`)
  }

  return value
}

function env(value: unknown, context: string): Record<string, string> | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  const fields = record(value, `${context}: env`)
  const result: Record<string, string> = {}
  for (const [key, setting] of Object.entries(fields)) {
    if (typeof setting === 'string') {
      result[key] = setting
    } else if (typeof setting === 'number' || typeof setting === 'boolean') {
      result[key] = String(setting)
    } else {
      throw new ValidationError(`Invalid ${context}: env.${key} must be a scalar`)
    }
  }

  return result
}
