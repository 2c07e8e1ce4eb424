import type { Effect } from 'effect'
import type { IoError } from './Errors.js'
import * as Fs from './internal/fs.js'

export type ProjectCommand = 'install' | 'test' | 'build' | 'start' | 'bundle'

export const PROJECT_COMMANDS: ReadonlyArray<ProjectCommand> = ['install', 'test', 'build', 'start', 'bundle']

/** The top-level directory every build writes to. */
export const OUTPUT_DIR = 'dist'

export const commandLine = (command: ProjectCommand): string => {
  switch (command) {
    case 'install':
      return 'npm install'
    case 'test':
      return 'npm test'
    case 'start':
      return 'npm start'
    case 'build':
    case 'bundle':
      return `npm run ${command}`
  }
}

/** Sorted `/`-separated paths of every file under `dir`; fails when `dir` does not exist. */
export const listOutputFiles = (dir: string): Effect.Effect<ReadonlyArray<string>, IoError> => Fs.listFiles(dir)
