import { Option } from 'effect'

export interface Version {
  readonly major: number
  readonly minor: number
  readonly patch: number
  readonly prerelease: string
}

interface PartialVersion {
  readonly major?: number
  readonly minor?: number
  readonly patch?: number
  readonly prerelease: string
}

const VERSION = /^v?(\d+)\.(\d+)\.(\d+)(?:-([0-9A-Za-z.-]+))?(?:\+[0-9A-Za-z.-]+)?$/
const PARTIAL = /^v?(\d+|[xX*])(?:\.(\d+|[xX*]))?(?:\.(\d+|[xX*]))?(?:-([0-9A-Za-z.-]+))?(?:\+[0-9A-Za-z.-]+)?$/
const COMPARATOR = /^(\^|~|>=|<=|>|<|=)?\s*(.+)$/

export const parseVersion = (text: string): Option.Option<Version> => {
  const match = VERSION.exec(text.trim())
  if (match === null) return Option.none()
  return Option.some({
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3]),
    prerelease: match[4] ?? '',
  })
}

const part = (text: string | undefined): number | undefined =>
  text === undefined || text === 'x' || text === 'X' || text === '*' ? undefined : Number(text)

const parsePartial = (text: string): Option.Option<PartialVersion> => {
  const match = PARTIAL.exec(text)
  if (match === null) return Option.none()
  const major = part(match[1])
  const minor = major === undefined ? undefined : part(match[2])
  const patch = minor === undefined ? undefined : part(match[3])
  return Option.some({ major, minor, patch, prerelease: match[4] ?? '' })
}

export const compare = (a: Version, b: Version): number => {
  if (a.major !== b.major) return a.major - b.major
  if (a.minor !== b.minor) return a.minor - b.minor
  if (a.patch !== b.patch) return a.patch - b.patch
  // A release sorts after its prereleases.
  if (a.prerelease === b.prerelease) return 0
  if (a.prerelease === '') return 1
  if (b.prerelease === '') return -1
  return comparePrerelease(a.prerelease.split('.'), b.prerelease.split('.'))
}

const NUMERIC = /^\d+$/

const compareIdentifier = (a: string, b: string): number => {
  const aNumeric = NUMERIC.test(a)
  const bNumeric = NUMERIC.test(b)
  if (aNumeric && bNumeric) return Number(a) - Number(b)
  // Numeric identifiers sort before alphanumeric ones.
  if (aNumeric) return -1
  if (bNumeric) return 1
  return a < b ? -1 : a > b ? 1 : 0
}

const comparePrerelease = (a: ReadonlyArray<string>, b: ReadonlyArray<string>): number => {
  const length = Math.min(a.length, b.length)
  for (let index = 0; index < length; index++) {
    const order = compareIdentifier(a[index] ?? '', b[index] ?? '')
    if (order !== 0) return order
  }
  return a.length - b.length
}

const version = (major: number, minor: number, patch: number, prerelease = ''): Version => ({
  major,
  minor,
  patch,
  prerelease,
})

const floor = (p: PartialVersion): Version => version(p.major ?? 0, p.minor ?? 0, p.patch ?? 0, p.prerelease)

// First version past the range `p` names when its missing parts are wildcards.
const ceiling = (p: PartialVersion, major: number): Version => {
  if (p.minor === undefined) return version(major + 1, 0, 0)
  if (p.patch === undefined) return version(major, p.minor + 1, 0)
  return version(major, p.minor, p.patch + 1)
}

type Test = (v: Version) => boolean

const within = (low: Version, high: Version): Test => (v) => compare(v, low) >= 0 && compare(v, high) < 0

const comparator = (text: string): Option.Option<Test> => {
  const match = COMPARATOR.exec(text)
  if (match === null) return Option.none()
  const op = match[1] ?? ''
  return Option.map(parsePartial(match[2]), (p): Test => {
    const { major, minor, patch } = p
    if (major === undefined) {
      return () => true
    }
    const low = floor(p)
    const exact = minor !== undefined && patch !== undefined
    switch (op) {
      case '^': {
        if (major > 0 || minor === undefined) return within(low, version(major + 1, 0, 0))
        if (minor > 0 || patch === undefined) return within(low, version(0, minor + 1, 0))
        return within(low, version(0, 0, patch + 1))
      }
      case '~':
        return within(low, minor === undefined ? version(major + 1, 0, 0) : version(major, minor + 1, 0))
      case '>=':
        return (v) => compare(v, low) >= 0
      case '>':
        return exact ? (v) => compare(v, low) > 0 : (v) => compare(v, ceiling(p, major)) >= 0
      case '<':
        return (v) => compare(v, low) < 0
      case '<=':
        return exact ? (v) => compare(v, low) <= 0 : (v) => compare(v, ceiling(p, major)) < 0
      default:
        return exact ? (v) => compare(v, low) === 0 : within(low, ceiling(p, major))
    }
  })
}

const OPERATOR = /^(?:\^|~|>=|<=|>|<|=)$/

// `>= 1.2.3` is one comparator; `1.2.3 - 2.0.0` is `>=1.2.3 <=2.0.0`.
const comparators = (alternative: string): Array<string> => {
  const tokens = alternative.trim().split(/\s+/).filter((s) => s.length > 0)
  const joined: Array<string> = []
  for (let index = 0; index < tokens.length; index++) {
    const token = tokens[index] ?? ''
    const next = tokens[index + 1]
    if (OPERATOR.test(token) && next !== undefined) {
      joined.push(token + next)
      index++
    } else {
      joined.push(token)
    }
  }
  if (joined.length === 3 && joined[1] === '-') return [`>=${joined[0] ?? ''}`, `<=${joined[2] ?? ''}`]
  return joined
}

const isWildcard = (constraint: string): boolean =>
  constraint === '' || constraint === '*' || constraint === 'x' || constraint === 'latest' || constraint.startsWith('workspace:')

/**
 * npm-style range check over `major.minor.patch`: exact, `^`, `~`, comparison operators,
 * x-ranges, hyphen ranges, space-separated intersections and `||` unions. Unparseable input never matches.
 */
export const satisfies = (versionText: string, constraint: string): boolean => {
  const trimmed = constraint.trim()
  if (isWildcard(trimmed)) return true
  const parsed = parseVersion(versionText)
  if (Option.isNone(parsed)) return false
  const v = parsed.value
  return trimmed.split('||').some((alternative) => {
    const parts = comparators(alternative)
    if (parts.length === 0) return true
    return parts.every((text) =>
      Option.match(comparator(text), {
        onNone: () => false,
        onSome: (test) => test(v),
      }),
    )
  })
}
