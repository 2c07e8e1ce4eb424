import fs from 'node:fs/promises'
import path from 'node:path'

import { describe, expect, it } from '@effect/vitest'
import { Effect } from 'effect'

import { Commands, LocalExecutor, Workflow } from '../../src/index.js'
import { makeProject } from '../fixtures/project.js'

// Stands in for `npm run build`: every src/*.ts becomes dist/*.js.
const compile: LocalExecutor.ShellRunner = (command, options) =>
  Effect.promise(async () => {
    const files = (await fs.readdir(path.join(options.cwd, 'src'))).filter((name) => name.endsWith('.ts'))
    await fs.mkdir(path.join(options.cwd, Commands.OUTPUT_DIR), { recursive: true })
    for (const file of files) {
      const target = path.join(options.cwd, Commands.OUTPUT_DIR, file.replace(/\.ts$/, '.js'))
      await fs.writeFile(target, `// ${command}\n`, 'utf8')
    }
    return { exitCode: 0, output: `compiled ${String(files.length)} files` }
  })

const buildStep = Workflow.run('build', 'Build', 'build', Commands.commandLine('build'))

describe('Commands.commandLine', () => {
  it('maps every project command to npm', () => {
    expect(Commands.PROJECT_COMMANDS.map(Commands.commandLine)).toEqual([
      'npm install',
      'npm test',
      'npm run build',
      'npm start',
      'npm run bundle',
    ])
  })
})

describe('Commands.listOutputFiles', () => {
  it.effect('lists output files sorted and relative to the output directory', () =>
    Effect.gen(function* () {
      const root = yield* Effect.promise(() =>
        makeProject({
          'dist/index.html': '<canvas id="canvas"></canvas>',
          'dist/assets/main.js': 'export {}',
          'dist/assets/rhb.json': {},
          'src/main.ts': 'export {}',
        }),
      )
      const files = yield* Commands.listOutputFiles(path.join(root, Commands.OUTPUT_DIR))
      expect(files).toEqual(['assets/main.js', 'assets/rhb.json', 'index.html'])
    }),
  )

  it.effect('gives the same file set when the same sources are built again', () =>
    Effect.gen(function* () {
      const sources = { 'src/walk.ts': 'export {}', 'src/score.ts': 'export {}', 'package.json': { name: 'demo' } }
      const first = yield* Effect.promise(() => makeProject(sources))
      const second = yield* Effect.promise(() => makeProject(sources))
      const build = (root: string) =>
        LocalExecutor.make({ root, shell: compile, env: {} })
          .execute(buildStep)
          .pipe(Effect.zipRight(Commands.listOutputFiles(path.join(root, Commands.OUTPUT_DIR))))

      const once = yield* build(first)
      const rebuilt = yield* build(first)
      const elsewhere = yield* build(second)

      expect(once).toEqual(['score.js', 'walk.js'])
      expect(rebuilt).toEqual(once)
      expect(elsewhere).toEqual(once)
    }),
  )

  it.effect('fails with IoError when the output directory is missing', () =>
    Effect.gen(function* () {
      const root = yield* Effect.promise(() => makeProject({}))
      const error = yield* Commands.listOutputFiles(path.join(root, 'dist')).pipe(Effect.flip)
      expect(error._tag).toBe('IoError')
      expect(error.path).toBe(path.join(root, 'dist'))
    }),
  )
})
