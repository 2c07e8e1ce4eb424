import * as Ctx from './context.js'
import type { BoyContext } from './context.js'

export type StateTag = 'Idle' | 'Running' | 'Sliding' | 'Jumping' | 'Falling' | 'KnockedOut'

export interface BoyState {
  readonly _tag: StateTag
  readonly context: BoyContext
}

export type BoyEvent =
  | { readonly _tag: 'Run' }
  | { readonly _tag: 'Slide' }
  | { readonly _tag: 'Jump' }
  | { readonly _tag: 'KnockOut' }
  | { readonly _tag: 'Land'; readonly position: number }
  | { readonly _tag: 'Update' }

const enter = (tag: StateTag, context: BoyContext): BoyState => ({ _tag: tag, context })

export const idle = (): BoyState => enter('Idle', Ctx.initial)

const knockOut = (state: BoyState): BoyState => {
  switch (state._tag) {
    case 'Running':
    case 'Jumping':
    case 'Sliding':
      return enter('Falling', Ctx.stop(Ctx.resetFrame(state.context)))
    default:
      return state
  }
}

const land = (state: BoyState, position: number): BoyState => {
  switch (state._tag) {
    case 'Running':
    case 'Sliding':
    case 'KnockedOut':
      return enter(state._tag, Ctx.setOn(state.context, position))
    case 'Jumping':
      return enter('Running', Ctx.setOn(Ctx.resetFrame(state.context), position))
    default:
      return state
  }
}

const update = (state: BoyState): BoyState => {
  switch (state._tag) {
    case 'Idle':
      return enter('Idle', Ctx.update(state.context, Ctx.IDLE_FRAMES))
    case 'Running':
      return enter('Running', Ctx.update(state.context, Ctx.RUNNING_FRAMES))
    case 'Sliding': {
      const context = Ctx.update(state.context, Ctx.SLIDING_FRAMES)
      return context.frame >= Ctx.SLIDING_FRAMES ? enter('Running', Ctx.resetFrame(context)) : enter('Sliding', context)
    }
    case 'Jumping': {
      const context = Ctx.update(state.context, Ctx.JUMPING_FRAMES)
      return context.position.y >= Ctx.FLOOR
        ? enter('Running', Ctx.setOn(Ctx.resetFrame(context), Ctx.HEIGHT))
        : enter('Jumping', context)
    }
    case 'Falling': {
      const context = Ctx.update(state.context, Ctx.FALLING_FRAMES)
      return context.frame >= Ctx.FALLING_FRAMES ? enter('KnockedOut', context) : enter('Falling', context)
    }
    case 'KnockedOut':
      return enter('KnockedOut', Ctx.applyVelocity(state.context))
  }
}

/**
 * Pairs that are not listed leave the state untouched (e.g. jumping while sliding).
 */
export const transition = (state: BoyState, event: BoyEvent): BoyState => {
  switch (event._tag) {
    case 'Run':
      return state._tag === 'Idle' ? enter('Running', Ctx.runRight(Ctx.resetFrame(state.context))) : state
    case 'Slide':
      return state._tag === 'Running' ? enter('Sliding', Ctx.resetFrame(state.context)) : state
    case 'Jump':
      return state._tag === 'Running'
        ? enter('Jumping', Ctx.resetFrame(Ctx.setVerticalVelocity(state.context, Ctx.JUMP_SPEED)))
        : state
    case 'KnockOut':
      return knockOut(state)
    case 'Land':
      return land(state, event.position)
    case 'Update':
      return update(state)
  }
}

export const frameName = (state: BoyState): string => {
  switch (state._tag) {
    case 'Idle':
      return 'Idle'
    case 'Running':
      return 'Run'
    case 'Sliding':
      return 'Slide'
    case 'Jumping':
      return 'Jump'
    case 'Falling':
    case 'KnockedOut':
      return 'Dead'
  }
}

// Each sheet image is shown for three updates.
export const spriteName = (state: BoyState): string =>
  `${frameName(state)} (${String(Math.floor(state.context.frame / 3) + 1)}).png`
