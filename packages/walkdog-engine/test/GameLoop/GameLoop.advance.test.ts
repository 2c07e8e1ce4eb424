import { describe, expect, it } from '@effect/vitest'
import { GameLoop } from '../../src/index.js'

describe('GameLoop.advance', () => {
  it('runs no update until more than one frame has passed', () => {
    const step = GameLoop.advance(GameLoop.makeClock(0), GameLoop.FRAME_SIZE)
    expect(step.updates).toBe(0)
    expect(step.clock.accumulatedDelta).toBe(GameLoop.FRAME_SIZE)
  })

  it('converts elapsed time into whole updates and carries the remainder', () => {
    const first = GameLoop.advance(GameLoop.makeClock(100), 140)
    expect(first.updates).toBe(2)
    expect(first.clock.lastFrame).toBe(140)
    expect(first.clock.accumulatedDelta).toBeCloseTo(40 - 2 * GameLoop.FRAME_SIZE)

    const second = GameLoop.advance(first.clock, 151)
    expect(second.updates).toBe(1)
    expect(second.clock.accumulatedDelta).toBeCloseTo(51 - 3 * GameLoop.FRAME_SIZE)
  })
})
