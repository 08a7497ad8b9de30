/**
 * Unit tests for config-system-impl.ts
 *
 * Tests:
 *  - Hierarchy loading (defaults < global < project < env < CLI)
 *  - Config validation errors
 *  - get() dot-notation access
 *  - set() with project file update
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, writeFile, readFile, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import yaml from 'js-yaml'
import { createConfigSystem, setByPath, getByPath, coerceScalar } from '../config-system-impl.js'
import type { ConfigSystemOptions } from '../config-system.js'
import { ConfigError } from '../../../core/errors.js'

// ---------------------------------------------------------------------------
// Test setup: temporary directories
// ---------------------------------------------------------------------------

let testDir: string
let projectConfigDir: string
let globalConfigDir: string

beforeEach(async () => {
  testDir = join(tmpdir(), `storyloom-config-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  projectConfigDir = join(testDir, 'project', '.storyloom')
  globalConfigDir = join(testDir, 'global', '.storyloom')
  await mkdir(projectConfigDir, { recursive: true })
  await mkdir(globalConfigDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
})

function createSystem(overrides: Partial<ConfigSystemOptions> = {}): ReturnType<typeof createConfigSystem> {
  return createConfigSystem({
    projectConfigDir,
    globalConfigDir,
    env: {},
    ...overrides,
  })
}

async function writeYaml(dir: string, content: string): Promise<void> {
  await writeFile(join(dir, 'config.yaml'), content, 'utf-8')
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

describe('ConfigSystem - default config', () => {
  it('loads built-in defaults when no config files exist', async () => {
    const system = createSystem()
    await system.load()
    const config = system.getConfig()

    expect(system.isLoaded).toBe(true)
    expect(config.global.max_concurrent_generations).toBe(4)
    expect(config.generation.attempt_timeout_ms).toBe(120000)
    expect(config.generation.backoff_base_ms).toBe(500)
    expect(config.context.token_budget).toBe(4000)
    expect(config.cardinality.character_list).toEqual({ min: 3, max: 8 })
    expect(config.routing.default_provider).toBe('claude-cli')
  })

  it('throws ConfigError from getConfig() before load()', () => {
    const system = createSystem()
    expect(() => system.getConfig()).toThrow(ConfigError)
  })
})

// ---------------------------------------------------------------------------
// Hierarchy
// ---------------------------------------------------------------------------

describe('ConfigSystem - hierarchy', () => {
  it('project config overrides global config', async () => {
    await writeYaml(globalConfigDir, 'global:\n  max_concurrent_generations: 2\ncontext:\n  token_budget: 100\n')
    await writeYaml(projectConfigDir, 'global:\n  max_concurrent_generations: 6\n')

    const system = createSystem()
    await system.load()

    expect(system.get('global.max_concurrent_generations')).toBe(6)
    expect(system.get('context.token_budget')).toBe(100)
  })

  it('environment variables override config files', async () => {
    await writeYaml(projectConfigDir, 'generation:\n  backoff_base_ms: 50\n')
    const system = createSystem({ env: { LOOM_BACKOFF_BASE_MS: '10', LOOM_DEFAULT_PROVIDER: 'scripted' } })
    await system.load()

    expect(system.get('generation.backoff_base_ms')).toBe(10)
    expect(system.get('routing.default_provider')).toBe('scripted')
  })

  it('CLI overrides win over environment variables', async () => {
    const system = createSystem({
      env: { LOOM_CONTEXT_TOKEN_BUDGET: '900' },
      cliOverrides: { context: { token_budget: 1200 } },
    })
    await system.load()
    expect(system.get('context.token_budget')).toBe(1200)
  })

  it('ignores invalid environment overrides', async () => {
    const system = createSystem({ env: { LOOM_LOG_LEVEL: 'loud' } })
    await system.load()
    expect(system.get('global.log_level')).toBe('warn')
  })

  it('merges routing rules from the project file', async () => {
    await writeYaml(
      projectConfigDir,
      'routing:\n  rules:\n    - task_kind: visual_prompt\n      provider: scripted\n',
    )
    const system = createSystem()
    await system.load()
    expect(system.getConfig().routing).toEqual({
      default_provider: 'claude-cli',
      rules: [{ task_kind: 'visual_prompt', provider: 'scripted' }],
    })
  })
})

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe('ConfigSystem - validation', () => {
  it('rejects unknown keys in a config file', async () => {
    await writeYaml(projectConfigDir, 'global:\n  colour: blue\n')
    const system = createSystem()
    await expect(system.load()).rejects.toThrow(ConfigError)
  })

  it('rejects cardinality bounds where min exceeds max', async () => {
    await writeYaml(projectConfigDir, 'cardinality:\n  scene_list:\n    min: 9\n    max: 4\n')
    const system = createSystem()
    await expect(system.load()).rejects.toThrow(/min must not exceed max/)
  })

  it('rejects an unsupported config_format_version', async () => {
    await writeYaml(projectConfigDir, 'config_format_version: "7"\n')
    const system = createSystem()
    await expect(system.load()).rejects.toThrow(/Unsupported config_format_version "7"/)
  })

  it('treats an empty config file as no overrides', async () => {
    await writeYaml(projectConfigDir, '')
    const system = createSystem()
    await system.load()
    expect(system.get('global.log_level')).toBe('warn')
  })
})

// ---------------------------------------------------------------------------
// set()
// ---------------------------------------------------------------------------

describe('ConfigSystem - set', () => {
  it('persists a scalar to the project config and reloads', async () => {
    const system = createSystem()
    await system.load()
    await system.set('context.token_budget', 2500)

    expect(system.get('context.token_budget')).toBe(2500)
    const written = yaml.load(await readFile(join(projectConfigDir, 'config.yaml'), 'utf-8'))
    expect(written).toEqual({ context: { token_budget: 2500 } })
  })

  it('rejects unknown keys', async () => {
    const system = createSystem()
    await system.load()
    await expect(system.set('global.colour', 'blue')).rejects.toThrow('Unknown config key: global.colour')
  })

  it('rejects setting a whole section', async () => {
    const system = createSystem()
    await system.load()
    await expect(system.set('generation', 1)).rejects.toThrow(ConfigError)
  })

  it('rejects a value that breaks the merged document', async () => {
    const system = createSystem()
    await system.load()
    await expect(system.set('cardinality.panel_list.min', 20)).rejects.toThrow(ConfigError)
    expect(system.get('cardinality.panel_list.min')).toBe(3)
  })
})

// ---------------------------------------------------------------------------
// Path helpers
// ---------------------------------------------------------------------------

describe('path helpers', () => {
  it('setByPath creates intermediate objects without mutating the input', () => {
    const input = { a: { b: 1 } }
    const result = setByPath(input, 'a.c.d', 2)
    expect(result).toEqual({ a: { b: 1, c: { d: 2 } } })
    expect(input).toEqual({ a: { b: 1 } })
  })

  it('getByPath returns undefined for missing segments', () => {
    expect(getByPath({ a: { b: 1 } }, 'a.b')).toBe(1)
    expect(getByPath({ a: { b: 1 } }, 'a.x.y')).toBeUndefined()
  })

  it('coerceScalar converts booleans and numbers', () => {
    expect(coerceScalar('true')).toBe(true)
    expect(coerceScalar('42')).toBe(42)
    expect(coerceScalar('0.5')).toBe(0.5)
    expect(coerceScalar('scripted')).toBe('scripted')
  })
})

describe('ConfigSystem - sources', () => {
  it('lists the layers that contributed, lowest first', async () => {
    await writeYaml(globalConfigDir, 'global:\n  max_concurrent_generations: 2\n')
    const system = createSystem({
      env: { LOOM_BACKOFF_BASE_MS: '10', LOOM_ATTEMPT_TIMEOUT_MS: '5000' },
      cliOverrides: { generation: { default_variants: 2 } },
    })
    await system.load()

    expect(system.getSources()).toEqual([
      { layer: 'defaults', detail: null },
      { layer: 'global', detail: join(globalConfigDir, 'config.yaml') },
      { layer: 'env', detail: 'LOOM_ATTEMPT_TIMEOUT_MS, LOOM_BACKOFF_BASE_MS' },
      { layer: 'cli', detail: null },
    ])
  })

  it('leaves out an env overlay that was refused', async () => {
    const system = createSystem({ env: { LOOM_MAX_CONCURRENT_GENERATIONS: '0' } })
    await system.load()

    expect(system.getSources()).toEqual([{ layer: 'defaults', detail: null }])
  })

  it('requires load() first', () => {
    expect(() => createSystem().getSources()).toThrow(ConfigError)
  })
})
