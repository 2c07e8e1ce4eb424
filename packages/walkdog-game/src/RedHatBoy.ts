import { Option } from 'effect'
import { Geometry, SpriteSheet } from '@walkdog/engine'
import type { ImageAsset, Rect, Renderer } from '@walkdog/engine'
import * as Ctx from './internal/boy/context.js'
import * as Machine from './internal/boy/machine.js'
import type { BoyEvent, BoyState, StateTag } from './internal/boy/machine.js'

export type { BoyContext } from './internal/boy/context.js'
export type { BoyEvent, BoyState, StateTag } from './internal/boy/machine.js'
export { transition, spriteName, frameName } from './internal/boy/machine.js'
export { FLOOR, HEIGHT, PLAYER_HEIGHT, STARTING_POINT, RUNNING_SPEED, JUMP_SPEED } from './internal/boy/context.js'

export const Event = {
  Run: { _tag: 'Run' },
  Slide: { _tag: 'Slide' },
  Jump: { _tag: 'Jump' },
  KnockOut: { _tag: 'KnockOut' },
  Update: { _tag: 'Update' },
  Land: (position: number): BoyEvent => ({ _tag: 'Land', position }),
} as const

/**
 * The player character: its animation state plus the sheet it is drawn from.
 */
export interface RedHatBoy {
  readonly state: BoyState
  readonly sheet: SpriteSheet.Sheet
  readonly image: ImageAsset
}

export const make = (sheet: SpriteSheet.Sheet, image: ImageAsset): RedHatBoy => ({
  state: Machine.idle(),
  sheet,
  image,
})

export const reset = (boy: RedHatBoy): RedHatBoy => make(boy.sheet, boy.image)

const on = (boy: RedHatBoy, event: BoyEvent): RedHatBoy => {
  const state = Machine.transition(boy.state, event)
  return state === boy.state ? boy : { ...boy, state }
}

export const update = (boy: RedHatBoy): RedHatBoy => on(boy, Event.Update)
export const runRight = (boy: RedHatBoy): RedHatBoy => on(boy, Event.Run)
export const slide = (boy: RedHatBoy): RedHatBoy => on(boy, Event.Slide)
export const jump = (boy: RedHatBoy): RedHatBoy => on(boy, Event.Jump)
export const knockOut = (boy: RedHatBoy): RedHatBoy => on(boy, Event.KnockOut)
export const landOn = (boy: RedHatBoy, position: number): RedHatBoy => on(boy, Event.Land(position))

export const tag = (boy: RedHatBoy): StateTag => boy.state._tag
export const knockedOut = (boy: RedHatBoy): boolean => boy.state._tag === 'KnockedOut'
export const walkingSpeed = (boy: RedHatBoy): number => boy.state.context.velocity.x
export const velocityY = (boy: RedHatBoy): number => boy.state.context.velocity.y
export const posY = (boy: RedHatBoy): number => boy.state.context.position.y

/** True when `after` is the result of a jump taken from `before`; the cue for the jump sound. */
export const startedJump = (before: RedHatBoy, after: RedHatBoy): boolean =>
  before.state._tag === 'Running' && after.state._tag === 'Jumping'

export const currentCell = (boy: RedHatBoy): Option.Option<SpriteSheet.Cell> =>
  SpriteSheet.lookup(boy.sheet, Machine.spriteName(boy.state))

export const destinationBox = (boy: RedHatBoy): Option.Option<Rect> =>
  Option.map(currentCell(boy), (cell) => {
    const { position } = boy.state.context
    return Geometry.rect(
      position.x + cell.spriteSourceSize.x,
      position.y + cell.spriteSourceSize.y,
      cell.frame.w,
      cell.frame.h,
    )
  })

// The sprite has transparent padding around the character.
const X_OFFSET = 18
const Y_OFFSET = 14
const WIDTH_OFFSET = 28
const HEIGHT_OFFSET = 14

export const boundingBox = (boy: RedHatBoy): Option.Option<Rect> =>
  Option.map(destinationBox(boy), (box) =>
    Geometry.rect(
      box.position.x + X_OFFSET,
      box.position.y + Y_OFFSET,
      box.width - WIDTH_OFFSET,
      box.height - HEIGHT_OFFSET,
    ),
  )

export const draw = (boy: RedHatBoy, renderer: Renderer.Service): void => {
  const cell = currentCell(boy)
  const destination = destinationBox(boy)
  if (Option.isSome(cell) && Option.isSome(destination)) {
    renderer.drawImage(boy.image, SpriteSheet.toRect(cell.value.frame), destination.value)
  }
  const box = boundingBox(boy)
  if (Option.isSome(box)) {
    renderer.drawRect(box.value)
  }
}

const ANIMATIONS: ReadonlyArray<readonly [string, number]> = [
  ['Idle', Ctx.IDLE_FRAMES],
  ['Run', Ctx.RUNNING_FRAMES],
  ['Slide', Ctx.SLIDING_FRAMES - 1],
  ['Jump', Ctx.JUMPING_FRAMES],
  ['Dead', Ctx.FALLING_FRAMES],
]

/** Every sprite name the state machine can ask the sheet for. */
export const requiredFrames = (): ReadonlyArray<string> =>
  ANIMATIONS.flatMap(([name, lastFrame]) =>
    Array.from({ length: Math.floor(lastFrame / 3) + 1 }, (_, i) => `${name} (${String(i + 1)}).png`),
  )
