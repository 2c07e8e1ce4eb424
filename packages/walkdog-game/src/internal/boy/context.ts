import type { Point } from '@walkdog/engine'

export const HEIGHT = 600
export const FLOOR = 479
export const STARTING_POINT = -20
export const PLAYER_HEIGHT = HEIGHT - FLOOR

export const IDLE_FRAMES = 29
export const RUNNING_FRAMES = 23
export const SLIDING_FRAMES = 15
export const JUMPING_FRAMES = 35
// 10 'Dead' frames in the sheet, * 3 - 1.
export const FALLING_FRAMES = 29

export const RUNNING_SPEED = 4
export const JUMP_SPEED = -25
export const MAX_VELOCITY = 20
export const GRAVITY = 1

export interface BoyContext {
  readonly frame: number
  readonly position: Point
  readonly velocity: Point
}

export const initial: BoyContext = {
  frame: 0,
  position: { x: STARTING_POINT, y: FLOOR },
  velocity: { x: 0, y: 0 },
}

export const applyVelocity = (context: BoyContext): BoyContext => {
  const y = Math.min(context.position.y + context.velocity.y, FLOOR)
  const vy = Math.min(context.velocity.y + GRAVITY, MAX_VELOCITY)
  return {
    ...context,
    position: { x: context.position.x, y },
    velocity: { x: context.velocity.x, y: vy },
  }
}

/** Advances the animation frame, wrapping after `frameCount`, then applies velocity. */
export const update = (context: BoyContext, frameCount: number): BoyContext =>
  applyVelocity({ ...context, frame: context.frame < frameCount ? context.frame + 1 : 0 })

export const resetFrame = (context: BoyContext): BoyContext => ({ ...context, frame: 0 })

export const runRight = (context: BoyContext): BoyContext => ({
  ...context,
  velocity: { x: context.velocity.x + RUNNING_SPEED, y: context.velocity.y },
})

export const setVerticalVelocity = (context: BoyContext, speed: number): BoyContext => ({
  ...context,
  velocity: { x: context.velocity.x, y: speed },
})

export const stop = (context: BoyContext): BoyContext => ({
  ...context,
  velocity: { x: 0, y: context.velocity.y },
})

/** Puts the boy's feet on the surface at `position`. */
export const setOn = (context: BoyContext, position: number): BoyContext => ({
  ...context,
  position: { x: context.position.x, y: position - PLAYER_HEIGHT },
})
