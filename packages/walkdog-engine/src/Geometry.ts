export interface Point {
  readonly x: number
  readonly y: number
}

export interface Rect {
  readonly position: Point
  readonly width: number
  readonly height: number
}

export const origin: Point = { x: 0, y: 0 }

export const point = (x: number, y: number): Point => ({ x, y })

export const rect = (x: number, y: number, width: number, height: number): Rect => ({
  position: { x, y },
  width,
  height,
})

/** Zero-sized rect at the origin; its right edge is 0. */
export const empty: Rect = rect(0, 0, 0, 0)

export const left = (r: Rect): number => r.position.x

export const top = (r: Rect): number => r.position.y

export const right = (r: Rect): number => r.position.x + r.width

export const bottom = (r: Rect): number => r.position.y + r.height

export const setX = (r: Rect, x: number): Rect => ({ ...r, position: { x, y: r.position.y } })

export const moveHorizontally = (r: Rect, dx: number): Rect => setX(r, r.position.x + dx)

/**
 * Axis-aligned overlap test. Touching edges do not count as an intersection.
 */
export const intersects = (a: Rect, b: Rect): boolean =>
  left(a) < right(b) && right(a) > left(b) && top(a) < bottom(b) && bottom(a) > top(b)
