// @vitest-environment happy-dom

import { describe, expect, it } from '@effect/vitest'
import { AudioError, Assets, Audio, Geometry, KeyState, Ui } from '@walkdog/engine'
import { Effect, Layer } from 'effect'
import { RedHatBoy, Walk, WalkTheDog } from '../../src/index.js'
import {
  boySheet,
  fakeAssets,
  fakeUi,
  image,
  makeWalk,
  recordingAudio,
  recordingRenderer,
  repeat,
  sheetOf,
  tileSheet,
} from '../fixtures/world.js'

const images = {
  'rhb.png': image(1000, 1000),
  'BG.png': image(800, 600),
  'Stone.png': image(90, 54),
  'tiles.png': image(640, 93),
}

const world = (audio: Audio.Service, ui: Ui.Service, json: Record<string, unknown> = {}) =>
  Layer.mergeAll(
    Layer.succeed(Assets.Tag, fakeAssets({ 'rhb.json': boySheet, 'tiles.json': tileSheet, ...json }, images)),
    Layer.succeed(Audio.Tag, audio),
    Layer.succeed(Ui.Tag, ui),
  )

const jumpSound: Audio.Sound = { path: 'SFX_Jump_23.mp3' }

const walking = (walk: Walk.Walk): WalkTheDog.WalkTheDog => ({ machine: { _tag: 'Walking', walk }, jumpSound })

const runningWalk = (): Walk.Walk => {
  const walk = makeWalk()
  return { ...walk, boy: RedHatBoy.runRight(walk.boy), timeline: 2000 }
}

describe('WalkTheDog.initialize', () => {
  it.effect('loads the assets, starts the music and waits in Ready', () =>
    Effect.gen(function* () {
      const events: Array<string> = []
      const game = yield* WalkTheDog.initialize.pipe(Effect.provide(world(recordingAudio(events), fakeUi().service)))

      expect(events).toEqual(['load:SFX_Jump_23.mp3', 'load:background_song.mp3', 'loop:background_song.mp3'])
      expect(game.machine._tag).toBe('Ready')
      expect(game.jumpSound).toEqual(jumpSound)
      expect(game.machine.walk.backgrounds.map((background) => background.position.x)).toEqual([0, 800])
      expect(game.machine.walk.timeline).toBe(754)
    }),
  )

  it.effect('fails when the player sheet lacks an animation frame', () =>
    Effect.gen(function* () {
      const events: Array<string> = []
      const partial = sheetOf(
        RedHatBoy.requiredFrames().filter((name) => name !== 'Jump (12).png'),
        boySheet.frames['Idle (1).png'],
      )
      const error = yield* WalkTheDog.initialize.pipe(
        Effect.provide(world(recordingAudio(events), fakeUi().service, { 'rhb.json': partial })),
        Effect.flip,
      )

      expect(error._tag).toBe('AssetError')
      expect(error.message).toBe('missing frames: Jump (12).png')
      expect(events).toEqual([])
    }),
  )
})

describe('WalkTheDog.update', () => {
  it.effect('idles in Ready until ArrowRight starts the walk', () =>
    Effect.gen(function* () {
      const layer = world(recordingAudio([]), fakeUi().service)
      const ready: WalkTheDog.WalkTheDog = { machine: WalkTheDog.ready(makeWalk()), jumpSound }

      const idle = yield* WalkTheDog.update(ready, KeyState.empty).pipe(Effect.provide(layer))
      expect(idle.machine._tag).toBe('Ready')
      expect(idle.machine.walk.boy.state.context.frame).toBe(1)

      const started = yield* WalkTheDog.update(ready, KeyState.fromPressed('ArrowRight')).pipe(Effect.provide(layer))
      expect(started.machine._tag).toBe('Walking')
      expect(RedHatBoy.walkingSpeed(started.machine.walk.boy)).toBe(4)
    }),
  )

  it.effect('plays the jump sound when the boy takes off', () =>
    Effect.gen(function* () {
      const events: Array<string> = []
      const next = yield* WalkTheDog.update(walking(runningWalk()), KeyState.fromPressed('Space')).pipe(
        Effect.provide(world(recordingAudio(events), fakeUi().service)),
      )
      expect(events).toEqual(['play:SFX_Jump_23.mp3'])
      expect(RedHatBoy.tag(next.machine.walk.boy)).toBe('Jumping')
    }),
  )

  it.effect('keeps walking when the jump sound fails', () =>
    Effect.gen(function* () {
      const broken: Audio.Service = {
        ...Audio.silent,
        playSound: (sound) => Effect.fail(new AudioError({ path: sound.path, message: 'sound was not loaded' })),
      }
      const next = yield* WalkTheDog.update(walking(runningWalk()), KeyState.fromPressed('Space')).pipe(
        Effect.provide(world(broken, fakeUi().service)),
      )
      expect(next.machine._tag).toBe('Walking')
      expect(RedHatBoy.tag(next.machine.walk.boy)).toBe('Jumping')
    }),
  )

  it.effect('ends the game once the boy is knocked out and restarts on New Game', () =>
    Effect.gen(function* () {
      const ui = fakeUi()
      const layer = world(recordingAudio([]), ui.service)
      const walk = runningWalk()
      const fallen = repeat(RedHatBoy.knockOut(walk.boy), 28, RedHatBoy.update)

      const over = yield* WalkTheDog.update(walking({ ...walk, boy: fallen, obstacles: [] }), KeyState.empty).pipe(
        Effect.provide(layer),
      )
      expect(over.machine._tag).toBe('GameOver')
      expect(ui.events).toEqual(['show:new_game:New Game'])
      expect(RedHatBoy.tag(over.machine.walk.boy)).toBe('Idle')
      expect(over.machine.walk.timeline).toBe(754)

      const waiting = yield* WalkTheDog.update(over, KeyState.fromPressed('ArrowRight')).pipe(Effect.provide(layer))
      expect(waiting.machine._tag).toBe('GameOver')

      ui.click()
      const again = yield* WalkTheDog.update(waiting, KeyState.empty).pipe(Effect.provide(layer))
      expect(again.machine._tag).toBe('Ready')
      expect(ui.events).toEqual(['show:new_game:New Game', 'hide'])
    }),
  )
})

describe('WalkTheDog.draw', () => {
  it('clears the whole canvas before drawing the walk', () => {
    const calls: Array<ReadonlyArray<unknown>> = []
    WalkTheDog.draw({ machine: WalkTheDog.ready(makeWalk()), jumpSound }, recordingRenderer(calls))
    expect(calls[0]).toEqual(['clear', Geometry.rect(0, 0, 600, 600)])
    expect(calls.length).toBe(13)
  })
})
