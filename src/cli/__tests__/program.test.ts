import { describe, it, expect, vi, afterEach } from 'vitest'
import { CommanderError } from 'commander'
import { createProgram } from '../program.js'

afterEach(() => {
  vi.restoreAllMocks()
})

describe('createProgram', () => {
  it('registers every loom command', () => {
    const program = createProgram('1.2.3')

    expect(program.name()).toBe('loom')
    expect(program.commands.map((command) => command.name())).toEqual([
      'init',
      'config',
      'generate',
      'status',
      'drafts',
      'select',
      'reject',
      'revise',
      'instruction',
      'providers',
    ])
  })

  it('groups instruction and config subcommands', () => {
    const program = createProgram('1.2.3')
    const subcommands = (name: string): string[] =>
      program.commands.find((command) => command.name() === name)?.commands.map((command) => command.name()) ?? []

    expect(subcommands('instruction')).toEqual(['add', 'list', 'deactivate'])
    expect(subcommands('config')).toEqual(['show', 'get', 'set'])
  })

  it('surfaces a missing argument as a CommanderError instead of exiting', async () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
    const program = createProgram('1.2.3')

    await expect(program.parseAsync(['node', 'loom', 'status'])).rejects.toBeInstanceOf(CommanderError)
  })

  it('prints the version', async () => {
    let stdout = ''
    vi.spyOn(process.stdout, 'write').mockImplementation((data: string | Uint8Array) => {
      stdout += typeof data === 'string' ? data : Buffer.from(data).toString()
      return true
    })
    const program = createProgram('1.2.3')

    await expect(program.parseAsync(['node', 'loom', '--version'])).rejects.toMatchObject({ exitCode: 0 })
    expect(stdout).toBe('1.2.3\n')
  })
})
