import { Effect, Option } from 'effect'
import fs from 'node:fs/promises'
import path from 'node:path'
import { IoError, messageOf } from '../Errors.js'

const isNotFound = (cause: unknown): boolean =>
  cause instanceof Error && 'code' in cause && (cause.code === 'ENOENT' || cause.code === 'ENOTDIR')

const ioError = (file: string, action: string) => (cause: unknown) =>
  new IoError({ path: file, message: `cannot ${action} ${file}: ${messageOf(cause)}`, cause })

export const readText = (file: string): Effect.Effect<string, IoError> =>
  Effect.tryPromise({
    try: () => fs.readFile(file, 'utf8'),
    catch: ioError(file, 'read'),
  })

/** `None` when the file does not exist. */
export const readTextIfExists = (file: string): Effect.Effect<Option.Option<string>, IoError> =>
  Effect.tryPromise({
    try: () => fs.readFile(file, 'utf8'),
    catch: (cause) => cause,
  }).pipe(
    Effect.map(Option.some),
    Effect.catchAll((cause) => (isNotFound(cause) ? Effect.succeed(Option.none()) : Effect.fail(ioError(file, 'read')(cause)))),
  )

export const writeText = (file: string, text: string): Effect.Effect<void, IoError> =>
  Effect.tryPromise({
    try: async () => {
      await fs.mkdir(path.dirname(file), { recursive: true })
      await fs.writeFile(file, text, 'utf8')
    },
    catch: ioError(file, 'write'),
  })

export const exists = (file: string): Effect.Effect<boolean> =>
  Effect.promise(() =>
    fs.stat(file).then(
      () => true,
      () => false,
    ),
  )

/** Names of the directories directly under `dir`, sorted; empty when `dir` is missing. */
export const listDirectories = (dir: string): Effect.Effect<ReadonlyArray<string>, IoError> =>
  Effect.tryPromise({
    try: () => fs.readdir(dir, { withFileTypes: true }),
    catch: (cause) => cause,
  }).pipe(
    Effect.map((entries) =>
      entries
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort(),
    ),
    Effect.catchAll((cause) => (isNotFound(cause) ? Effect.succeed([]) : Effect.fail(ioError(dir, 'list')(cause)))),
  )

/** Every file under `dir` as a sorted, `/`-separated path relative to `dir`. */
export const listFiles = (dir: string): Effect.Effect<ReadonlyArray<string>, IoError> =>
  Effect.tryPromise({
    try: () => fs.readdir(dir, { recursive: true, withFileTypes: true }),
    catch: ioError(dir, 'list'),
  }).pipe(
    Effect.map((entries) =>
      entries
        .filter((entry) => entry.isFile())
        .map((entry) => path.relative(dir, path.join(entry.parentPath ?? entry.path, entry.name)).split(path.sep).join('/'))
        .sort(),
    ),
  )

/** Replaces `destination` with a copy of `source`. */
export const copyTree = (source: string, destination: string): Effect.Effect<void, IoError> =>
  Effect.tryPromise({
    try: async () => {
      await fs.rm(destination, { recursive: true, force: true })
      await fs.mkdir(path.dirname(destination), { recursive: true })
      await fs.cp(source, destination, { recursive: true })
    },
    catch: ioError(source, 'copy'),
  })
