import fs from 'node:fs/promises'
import path from 'node:path'

import { describe, expect, it } from '@effect/vitest'
import { Effect, Either } from 'effect'

import { Cli, Workflow } from '../../src/index.js'
import { failure, fakeExecutor, makeProject } from '../fixtures/project.js'

describe('Cli.parseArgs', () => {
  it('reads the run options', () => {
    expect(Either.getOrNull(Cli.parseArgs(['run', '--root', 'repo', '--only', 'install, test']))).toEqual({
      kind: 'run',
      root: 'repo',
      only: ['install', 'test'],
    })
  })

  it('rejects options the command does not take', () => {
    const parsed = Cli.parseArgs(['verify', '--file', 'build.yml'])
    expect(Either.isLeft(parsed) && parsed.left.message).toBe('unknown option --file for verify')
  })

  it('rejects names inherited from Object.prototype', () => {
    const inherited = Cli.parseArgs(['toString'])
    expect(Either.isLeft(inherited) && inherited.left.message).toBe('unknown command toString')
    const withFlag = Cli.parseArgs(['constructor', '--root', 'x'])
    expect(Either.isLeft(withFlag) && withFlag.left.message).toBe('unknown command constructor')
  })

  it('rejects an option without a value', () => {
    const parsed = Cli.parseArgs(['run', '--only'])
    expect(Either.isLeft(parsed) && parsed.left.message).toBe('--only needs a value')
  })
})

describe('Cli.main', () => {
  it.effect('prints help and exits 2 without a command', () =>
    Effect.gen(function* () {
      const outcome = yield* Cli.main([])
      expect(outcome.exitCode).toBe(2)
      expect(outcome.stdout).toBe(`missing command\n\n${Cli.helpText()}`)
    }),
  )

  it.effect('exits 2 for an unknown command', () =>
    Effect.gen(function* () {
      const outcome = yield* Cli.main(['deploy'])
      expect(outcome.exitCode).toBe(2)
      expect(outcome.stdout.split('\n')[0]).toBe('unknown command deploy')
    }),
  )

  it.effect('prints help on request', () =>
    Effect.gen(function* () {
      expect(yield* Cli.main(['--help'])).toEqual({ stdout: Cli.helpText(), exitCode: 0 })
    }),
  )

  it.effect('renders the workflow', () =>
    Effect.gen(function* () {
      const outcome = yield* Cli.main(['render'])
      expect(outcome).toEqual({ stdout: Workflow.renderWorkflow(Workflow.buildWorkflow), exitCode: 0 })
    }),
  )

  it.effect('writes the rendered workflow where --out points', () =>
    Effect.gen(function* () {
      const root = yield* Effect.promise(() => makeProject({}))
      const file = path.join(root, '.github', 'workflows', 'build.yml')
      expect(yield* Cli.main(['render', '--out', file])).toEqual({ stdout: `wrote ${file}`, exitCode: 0 })
      expect(yield* Effect.promise(() => fs.readFile(file, 'utf8'))).toBe(Workflow.renderWorkflow(Workflow.buildWorkflow))
    }),
  )

  it.effect('exits 1 when the workflow file drifted', () =>
    Effect.gen(function* () {
      const root = yield* Effect.promise(() => makeProject({ 'build.yml': 'name: build\n' }))
      const file = path.join(root, 'build.yml')
      const outcome = yield* Cli.main(['check', '--file', file])
      expect(outcome.exitCode).toBe(1)
      expect(outcome.stdout).toBe(`${file} drifted at line 2: expected "on:", found "<end of file>"`)
    }),
  )

  it.effect('exits 0 when the workflow file is up to date', () =>
    Effect.gen(function* () {
      const root = yield* Effect.promise(() =>
        makeProject({ 'build.yml': Workflow.renderWorkflow(Workflow.buildWorkflow) }),
      )
      const file = path.join(root, 'build.yml')
      expect(yield* Cli.main(['check', '--file', file])).toEqual({ stdout: `${file} is up to date`, exitCode: 0 })
    }),
  )

  it.effect('verifies installed dependencies', () =>
    Effect.gen(function* () {
      const root = yield* Effect.promise(() =>
        makeProject({
          'package.json': { name: 'walkdog', dependencies: { effect: '^3.11.0' } },
          'node_modules/effect/package.json': { name: 'effect', version: '3.12.0' },
        }),
      )
      expect(yield* Cli.main(['verify', '--root', root])).toEqual({
        stdout: 'effect@3.12.0\nverified 1 dependencies',
        exitCode: 0,
      })
    }),
  )

  it.effect('exits 1 when a dependency is missing', () =>
    Effect.gen(function* () {
      const root = yield* Effect.promise(() =>
        makeProject({ 'package.json': { name: 'walkdog', dependencies: { effect: '^3.11.0' } } }),
      )
      expect(yield* Cli.main(['verify', '--root', root])).toEqual({
        stdout: 'effect@^3.11.0 is not installed',
        exitCode: 1,
      })
    }),
  )

  it.effect('runs the selected steps and exits 1 on a blocking failure', () =>
    Effect.gen(function* () {
      const executor = fakeExecutor({ test: failure('test') })
      const roots: Array<string> = []
      const outcome = yield* Cli.main(['run', '--root', '/repo', '--only', 'install,test'], {
        executor: (root) => {
          roots.push(root)
          return executor.service
        },
      })

      expect(roots).toEqual([path.resolve('/repo')])
      expect(executor.executed).toEqual(['install', 'test'])
      expect(outcome).toEqual({
        stdout: ['build: failure', '  success          install', '  failure          test (test exited with code 1)', 'artifacts: (none)'].join(
          '\n',
        ),
        exitCode: 1,
      })
    }),
  )

  it.effect('exits 2 for an unknown step id', () =>
    Effect.gen(function* () {
      const outcome = yield* Cli.main(['run', '--only', 'deploy'], { executor: () => fakeExecutor().service })
      expect(outcome.exitCode).toBe(2)
    }),
  )
})
