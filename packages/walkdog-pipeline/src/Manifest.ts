import { Array as Arr, Effect, Option, ParseResult, Schema } from 'effect'
import path from 'node:path'
import { IoError, ManifestError, resolutionError, type DependencyResolutionError, type ResolutionProblem } from './Errors.js'
import * as Fs from './internal/fs.js'
import { satisfies } from './internal/semver.js'

export { satisfies } from './internal/semver.js'

// ---------------------------------------------------------------------------
// Declarations
// ---------------------------------------------------------------------------

export type DependencyScope = 'runtime' | 'dev'

export interface DependencyDeclaration {
  readonly name: string
  /** Version constraint, e.g. `^3.11.0`. */
  readonly version: string
  /** Sorted, without duplicates. */
  readonly features: ReadonlyArray<string>
  readonly optional: boolean
  readonly scope: DependencyScope
}

export interface DeclareOptions {
  readonly features?: ReadonlyArray<string>
  readonly optional?: boolean
  readonly scope?: DependencyScope
}

const sortedUnique = (values: Iterable<string>): ReadonlyArray<string> => Array.from(new Set(values)).sort()

export const declare = (name: string, version: string, options: DeclareOptions = {}): DependencyDeclaration => ({
  name,
  version,
  features: sortedUnique(options.features ?? []),
  optional: options.optional ?? false,
  scope: options.scope ?? 'runtime',
})

/** Adds feature flags. Merging is idempotent and order-independent. */
export const withFeatures = (dep: DependencyDeclaration, features: Iterable<string>): DependencyDeclaration => ({
  ...dep,
  features: sortedUnique([...dep.features, ...features]),
})

// ---------------------------------------------------------------------------
// package.json
// ---------------------------------------------------------------------------

const DependencyTable = Schema.Record({ key: Schema.String, value: Schema.String })

export const PackageManifest = Schema.Struct({
  name: Schema.String,
  version: Schema.optional(Schema.String),
  description: Schema.optional(Schema.String),
  private: Schema.optional(Schema.Boolean),
  workspaces: Schema.optional(Schema.Array(Schema.String)),
  scripts: Schema.optional(DependencyTable),
  dependencies: Schema.optional(DependencyTable),
  devDependencies: Schema.optional(DependencyTable),
  optionalDependencies: Schema.optional(DependencyTable),
})
export type PackageManifest = typeof PackageManifest.Type

export const decodePackageManifest = (
  json: unknown,
  source = 'package.json',
): Effect.Effect<PackageManifest, ManifestError> =>
  Schema.decodeUnknown(PackageManifest)(json).pipe(
    Effect.mapError(
      (error) =>
        new ManifestError({
          path: source,
          message: ParseResult.TreeFormatter.formatErrorSync(error),
          cause: error,
        }),
    ),
  )

export const readPackageManifest = (file: string): Effect.Effect<PackageManifest, ManifestError | IoError> =>
  Fs.readText(file).pipe(
    Effect.flatMap((text) =>
      Effect.try({
        try: (): unknown => JSON.parse(text),
        catch: (cause) => new ManifestError({ path: file, message: `invalid JSON in ${file}`, cause }),
      }),
    ),
    Effect.flatMap((json) => decodePackageManifest(json, file)),
  )

const tableOf = (
  table: Readonly<Record<string, string>> | undefined,
  options: DeclareOptions,
): ReadonlyArray<DependencyDeclaration> =>
  Object.entries(table ?? {}).map(([name, version]) => declare(name, version, options))

/** Runtime declarations first (optional ones last), then dev declarations. */
export const dependenciesOf = (manifest: PackageManifest): ReadonlyArray<DependencyDeclaration> => [
  ...tableOf(manifest.dependencies, { scope: 'runtime' }),
  ...tableOf(manifest.optionalDependencies, { scope: 'runtime', optional: true }),
  ...tableOf(manifest.devDependencies, { scope: 'dev' }),
]

// ---------------------------------------------------------------------------
// Installed versions
// ---------------------------------------------------------------------------

export interface Workspace {
  readonly dir: string
  readonly manifest: PackageManifest
}

export interface Installation {
  /** Distinct versions found per package name, in discovery order. */
  readonly versions: ReadonlyMap<string, ReadonlyArray<string>>
  /** Packages that live in the repository itself. */
  readonly workspaces: ReadonlySet<string>
}

export type ResolvedGraph = ReadonlyMap<string, string>

const workspaceDirs = (root: string, patterns: ReadonlyArray<string>): Effect.Effect<ReadonlyArray<string>, IoError> =>
  Effect.forEach(patterns, (pattern): Effect.Effect<ReadonlyArray<string>, IoError> => {
    if (!pattern.endsWith('/*')) {
      return Effect.succeed([path.join(root, pattern)])
    }
    const parent = path.join(root, pattern.slice(0, -2))
    return Fs.listDirectories(parent).pipe(Effect.map((names) => names.map((name) => path.join(parent, name))))
  }).pipe(Effect.map((dirs) => dirs.flat()))

/** The workspaces the root manifest lists that have a package.json. */
export const readWorkspaces = (
  root: string,
  manifest: PackageManifest,
): Effect.Effect<ReadonlyArray<Workspace>, ManifestError | IoError> =>
  workspaceDirs(root, manifest.workspaces ?? []).pipe(
    Effect.flatMap((dirs) =>
      Effect.forEach(dirs, (dir) =>
        Fs.exists(path.join(dir, 'package.json')).pipe(
          Effect.flatMap((found): Effect.Effect<Option.Option<Workspace>, ManifestError | IoError> =>
            found
              ? readPackageManifest(path.join(dir, 'package.json')).pipe(
                  Effect.map((workspace) => Option.some<Workspace>({ dir, manifest: workspace })),
                )
              : Effect.succeed(Option.none<Workspace>()),
          ),
        ),
      ),
    ),
    Effect.map(Arr.getSomes),
  )

// Only the fields the check needs; installed packages carry arbitrary extras.
const InstalledPackage = Schema.Struct({ name: Schema.String, version: Schema.String })

const installedVersion = (dir: string, name: string): Effect.Effect<Option.Option<string>, ManifestError | IoError> => {
  const file = path.join(dir, 'node_modules', name, 'package.json')
  return Fs.readTextIfExists(file).pipe(
    Effect.flatMap(
      Option.match({
        onNone: (): Effect.Effect<Option.Option<string>, ManifestError> => Effect.succeed(Option.none<string>()),
        onSome: (text): Effect.Effect<Option.Option<string>, ManifestError> =>
          Effect.try({
            try: (): unknown => JSON.parse(text),
            catch: (cause) => new ManifestError({ path: file, message: `invalid JSON in ${file}`, cause }),
          }).pipe(
            Effect.flatMap((json) =>
              Schema.decodeUnknown(InstalledPackage)(json).pipe(
                Effect.mapError(
                  (error) =>
                    new ManifestError({
                      path: file,
                      message: ParseResult.TreeFormatter.formatErrorSync(error),
                      cause: error,
                    }),
                ),
              ),
            ),
            Effect.map((installed) => Option.some(installed.version)),
          ),
      }),
    ),
  )
}

/**
 * Reads the installed versions of `names` from `node_modules` under the root and under every workspace.
 */
export const collectInstalled = (
  root: string,
  names: Iterable<string>,
): Effect.Effect<Installation, ManifestError | IoError> =>
  Effect.gen(function* () {
    const manifest = yield* readPackageManifest(path.join(root, 'package.json'))
    const workspaces = yield* readWorkspaces(root, manifest)
    const local = new Set(workspaces.map((workspace) => workspace.manifest.name))
    const locations = [root, ...workspaces.map((workspace) => workspace.dir)]

    const versions = new Map<string, ReadonlyArray<string>>()
    for (const name of sortedUnique(names)) {
      if (local.has(name)) continue
      const found = yield* Effect.forEach(locations, (dir) => installedVersion(dir, name))
      versions.set(name, sortedUnique(found.flatMap((version) => Option.toArray(version))))
    }
    return { versions, workspaces: local }
  })

/**
 * Checks that every declaration resolved to exactly one installed version that satisfies it.
 * Reports every problem at once.
 */
export const verifyResolution = (
  declarations: ReadonlyArray<DependencyDeclaration>,
  installation: Installation,
): Effect.Effect<ResolvedGraph, DependencyResolutionError> => {
  const problems: Array<ResolutionProblem> = []
  const graph = new Map<string, string>()
  const reported = new Set<string>()

  for (const dep of declarations) {
    if (installation.workspaces.has(dep.name) || dep.version.startsWith('workspace:')) continue
    const versions = installation.versions.get(dep.name) ?? []
    const key = `${dep.name}@${dep.version}`
    if (reported.has(key)) continue
    reported.add(key)

    if (versions.length === 0) {
      if (!dep.optional) problems.push({ _tag: 'Missing', name: dep.name, constraint: dep.version })
      continue
    }
    if (versions.length > 1) {
      problems.push({ _tag: 'Duplicate', name: dep.name, versions })
      continue
    }
    const [version] = versions
    if (!satisfies(version, dep.version)) {
      problems.push({ _tag: 'Unsatisfied', name: dep.name, constraint: dep.version, version })
      continue
    }
    graph.set(dep.name, version)
  }

  return problems.length === 0 ? Effect.succeed(graph) : Effect.fail(resolutionError(problems))
}

/** Root and workspace declarations verified against what npm installed under `root`. */
export const verifyProject = (
  root: string,
): Effect.Effect<ResolvedGraph, ManifestError | IoError | DependencyResolutionError> =>
  Effect.gen(function* () {
    const manifest = yield* readPackageManifest(path.join(root, 'package.json'))
    const workspaces = yield* readWorkspaces(root, manifest)
    const declarations = [manifest, ...workspaces.map((workspace) => workspace.manifest)].flatMap(dependenciesOf)
    const installation = yield* collectInstalled(
      root,
      declarations.map((dep) => dep.name),
    )
    const graph = yield* verifyResolution(declarations, installation)
    yield* Effect.logDebug(`verified ${String(graph.size)} dependencies`)
    return graph
  })

// ---------------------------------------------------------------------------
// Build profiles
// ---------------------------------------------------------------------------

export interface BuildProfile {
  readonly name: 'release' | 'development'
  readonly minify: boolean
  readonly sourcemap: boolean
  readonly target: string
}

/** Minified, no source maps: what ships. */
export const release: BuildProfile = { name: 'release', minify: true, sourcemap: false, target: 'es2022' }

export const development: BuildProfile = { name: 'development', minify: false, sourcemap: true, target: 'es2022' }

/** The bundler `build` options for a profile; shaped like Vite's `BuildOptions`. */
export interface BundlerOptions {
  readonly outDir: string
  readonly emptyOutDir: boolean
  readonly minify: boolean
  readonly sourcemap: boolean
  readonly target: string
}

export const toBundlerOptions = (profile: BuildProfile, outDir: string): BundlerOptions => ({
  outDir,
  emptyOutDir: true,
  minify: profile.minify,
  sourcemap: profile.sourcemap,
  target: profile.target,
})
