import fs from 'node:fs/promises'
import path from 'node:path'

import { describe, expect, it } from '@effect/vitest'
import { Effect } from 'effect'

import { IoError } from '../../src/Errors.js'
import { LocalExecutor, Workflow } from '../../src/index.js'
import { makeProject } from '../fixtures/project.js'

interface ShellCall {
  readonly command: string
  readonly options: LocalExecutor.ShellOptions
}

const fakeShell = (
  exitCodes: Readonly<Record<string, number>> = {},
): { readonly shell: LocalExecutor.ShellRunner; readonly calls: Array<ShellCall> } => {
  const calls: Array<ShellCall> = []
  return {
    calls,
    shell: (command, options) =>
      Effect.sync(() => {
        calls.push({ command, options })
        return { exitCode: exitCodes[command] ?? 0, output: `ran ${command}` }
      }),
  }
}

const step = (id: string): Workflow.Step => {
  const found = Workflow.buildWorkflow.job.steps.find((candidate) => candidate.id === id)
  if (found === undefined) throw new Error(`no step ${id}`)
  return found
}

describe('LocalExecutor run steps', () => {
  it.effect('runs the command in the root and drops hosted-runner expressions from env', () =>
    Effect.gen(function* () {
      const { shell, calls } = fakeShell()
      const executor = LocalExecutor.make({ root: '/repo', shell, env: { PATH: '/usr/bin' } })

      const result = yield* executor.execute(step('lint'))

      expect(result).toEqual({ output: 'ran npm run lint' })
      expect(calls).toEqual([{ command: 'npm run lint', options: { cwd: '/repo', env: { PATH: '/usr/bin' } } }])
    }),
  )

  it.effect('passes literal step env through', () =>
    Effect.gen(function* () {
      const { shell, calls } = fakeShell()
      const executor = LocalExecutor.make({ root: '/repo', shell, env: { PATH: '/usr/bin' } })

      yield* executor.execute(Workflow.advisory(Workflow.run('lint', 'Lint', 'lint', 'npm run lint'), { CI: 'true' }))

      expect(calls[0]?.options.env).toEqual({ PATH: '/usr/bin', CI: 'true' })
    }),
  )

  it.effect('fails with the exit code and output of a non-zero exit', () =>
    Effect.gen(function* () {
      const { shell } = fakeShell({ 'npm test': 2 })
      const executor = LocalExecutor.make({ root: '/repo', shell })

      const error = yield* executor.execute(step('test')).pipe(Effect.flip)

      expect(error.stepId).toBe('test')
      expect(error.exitCode).toBe(2)
      expect(error.message).toBe('npm test exited with code 2')
      expect(error.output).toBe('ran npm test')
    }),
  )

  it.effect('reports a shell that cannot start as exit code 127', () =>
    Effect.gen(function* () {
      const executor = LocalExecutor.make({
        root: '/repo',
        shell: () => Effect.fail(new IoError({ path: '/repo', message: 'cannot run npm test: spawn ENOENT' })),
      })

      const error = yield* executor.execute(step('test')).pipe(Effect.flip)

      expect(error.exitCode).toBe(127)
      expect(error.message).toBe('cannot run npm test: spawn ENOENT')
    }),
  )
})

describe('LocalExecutor actions', () => {
  it.effect('treats checkout and cache as no-ops', () =>
    Effect.gen(function* () {
      const { shell, calls } = fakeShell()
      const executor = LocalExecutor.make({ root: '/repo', shell })

      expect(yield* executor.execute(step('checkout'))).toEqual({ output: '' })
      expect(yield* executor.execute(step('cache'))).toEqual({ output: '' })
      expect(calls).toEqual([])
    }),
  )

  it.effect('accepts a running node with the pinned major', () =>
    Effect.gen(function* () {
      const executor = LocalExecutor.make({ root: '/repo', nodeVersion: '20.11.1' })
      expect(yield* executor.execute(step('toolchain'))).toEqual({ output: 'node 20.11.1' })
    }),
  )

  it.effect('rejects a running node with another major', () =>
    Effect.gen(function* () {
      const executor = LocalExecutor.make({ root: '/repo', nodeVersion: '18.19.0' })
      const error = yield* executor.execute(step('toolchain')).pipe(Effect.flip)
      expect(error.message).toBe('node 18.19.0 does not match pinned 20.18.0')
    }),
  )

  it.effect('fails on actions without a local equivalent', () =>
    Effect.gen(function* () {
      const executor = LocalExecutor.make({ root: '/repo' })
      const error = yield* executor
        .execute(Workflow.uses('deploy', 'Deploy', 'artifact', 'acme/deploy@v1'))
        .pipe(Effect.flip)
      expect(error.message).toBe('no local equivalent for acme/deploy@v1')
    }),
  )

  it.effect('copies the artifact path under .artifacts', () =>
    Effect.gen(function* () {
      const root = yield* Effect.promise(() => makeProject({ 'dist/index.html': '<canvas></canvas>' }))
      const executor = LocalExecutor.make({ root })

      const result = yield* executor.execute(step('artifact'))
      const copied = yield* Effect.promise(() =>
        fs.readFile(path.join(root, LocalExecutor.ARTIFACTS_DIR, 'dist-artifact', 'index.html'), 'utf8'),
      )

      expect(result).toEqual({ output: `dist-artifact -> ${path.join('.artifacts', 'dist-artifact')}` })
      expect(copied).toBe('<canvas></canvas>')
    }),
  )

  it.effect('fails when the artifact path does not exist', () =>
    Effect.gen(function* () {
      const root = yield* Effect.promise(() => makeProject({}))
      const error = yield* LocalExecutor.make({ root }).execute(step('artifact')).pipe(Effect.flip)
      expect(error.message).toBe('artifact path ./dist/ does not exist')
    }),
  )
})
