import { Image, KeyState } from '@walkdog/engine'
import type { ImageAsset, PlacedImage, Renderer } from '@walkdog/engine'
import * as Obstacle from './Obstacle.js'
import * as RedHatBoy from './RedHatBoy.js'
import * as Segment from './Segment.js'

export const TIMELINE_MINIMUM = 1000
export const OBSTACLE_BUFFER = 20

/**
 * The scrolling world: the boy stays in place while backgrounds and obstacles move left.
 * `timeline` is the world x up to which obstacles have been generated.
 */
export interface Walk {
  readonly boy: RedHatBoy.RedHatBoy
  readonly backgrounds: readonly [PlacedImage, PlacedImage]
  readonly obstacles: ReadonlyArray<Obstacle.Obstacle>
  readonly assets: Segment.SegmentAssets
  readonly timeline: number
}

export interface WalkAssets extends Segment.SegmentAssets {
  readonly background: ImageAsset
}

/** Right edge of the furthest obstacle, or 0 when there are none. */
export const rightmost = (obstacles: ReadonlyArray<Obstacle.Obstacle>): number =>
  obstacles.length === 0 ? 0 : Math.max(...obstacles.map(Obstacle.right))

const start = (boy: RedHatBoy.RedHatBoy, backgrounds: Walk['backgrounds'], assets: Segment.SegmentAssets): Walk => {
  const obstacles = Segment.stoneAndPlatform(assets, 0)
  return { boy, backgrounds, obstacles, assets, timeline: rightmost(obstacles) }
}

export const make = (boy: RedHatBoy.RedHatBoy, { background, stone, tiles }: WalkAssets): Walk =>
  start(
    boy,
    [
      Image.place(background, { x: 0, y: 0 }),
      Image.place(background, { x: background.width, y: 0 }),
    ],
    { stone, tiles },
  )

/** A fresh boy and the starting obstacles; the backgrounds stay where they are. */
export const reset = (walk: Walk): Walk => start(RedHatBoy.reset(walk.boy), walk.backgrounds, walk.assets)

export const velocity = (walk: Walk): number => -RedHatBoy.walkingSpeed(walk.boy)

export const knockedOut = (walk: Walk): boolean => RedHatBoy.knockedOut(walk.boy)

export const needsSegment = (walk: Walk): boolean => walk.timeline < TIMELINE_MINIMUM

/** Appends segment `index` of `Segment.all` past the timeline. */
export const generateNextSegment = (walk: Walk, index: number): Walk => {
  const segment = Segment.all[index] ?? Segment.stoneAndPlatform
  const obstacles = [...walk.obstacles, ...segment(walk.assets, walk.timeline + OBSTACLE_BUFFER)]
  return { ...walk, obstacles, timeline: rightmost(obstacles) }
}

const scroll = ([first, second]: Walk['backgrounds'], dx: number): Walk['backgrounds'] => {
  let a = Image.moveHorizontally(first, dx)
  let b = Image.moveHorizontally(second, dx)
  if (Image.right(a) < 0) {
    a = Image.setX(a, Image.right(b))
  }
  if (Image.right(b) < 0) {
    b = Image.setX(b, Image.right(a))
  }
  return [a, b]
}

export interface StepResult {
  readonly walk: Walk
  /** The boy took off this step; play the jump sound. */
  readonly jumped: boolean
}

/**
 * One fixed-timestep update while walking. `segment` picks the next segment when the timeline runs short.
 */
export const step = (walk: Walk, keys: KeyState.KeyState, segment: number): StepResult => {
  let boy = walk.boy
  if (KeyState.isPressed(keys, 'ArrowDown')) {
    boy = RedHatBoy.slide(boy)
  }
  if (KeyState.isPressed(keys, 'ArrowRight')) {
    boy = RedHatBoy.runRight(boy)
  }
  const beforeJump = boy
  if (KeyState.isPressed(keys, 'Space')) {
    boy = RedHatBoy.jump(boy)
  }
  const jumped = RedHatBoy.startedJump(beforeJump, boy)
  boy = RedHatBoy.update(boy)

  const dx = -RedHatBoy.walkingSpeed(boy)
  const backgrounds = scroll(walk.backgrounds, dx)

  const obstacles: Array<Obstacle.Obstacle> = []
  for (const obstacle of walk.obstacles) {
    if (Obstacle.right(obstacle) <= 0) {
      continue
    }
    const moved = Obstacle.moveHorizontally(obstacle, dx)
    boy = Obstacle.checkIntersection(moved, boy)
    obstacles.push(moved)
  }

  const next: Walk = { ...walk, boy, backgrounds, obstacles }
  return {
    walk: needsSegment(walk) ? generateNextSegment(next, segment) : { ...next, timeline: walk.timeline + dx },
    jumped,
  }
}

export const draw = (walk: Walk, renderer: Renderer.Service): void => {
  walk.backgrounds.forEach((background) => Image.draw(background, renderer))
  RedHatBoy.draw(walk.boy, renderer)
  walk.obstacles.forEach((obstacle) => Obstacle.draw(obstacle, renderer))
}
