import { Effect, Random } from 'effect'
import { AssetError, Assets, Audio, Geometry, KeyState, SpriteSheet, Ui } from '@walkdog/engine'
import type { AudioError, Game, Renderer, UiError } from '@walkdog/engine'
import * as RedHatBoy from './RedHatBoy.js'
import * as Segment from './Segment.js'
import * as Walk from './Walk.js'

export const GameAssets = {
  boySheet: 'rhb.json',
  boyImage: 'rhb.png',
  jumpSound: 'SFX_Jump_23.mp3',
  music: 'background_song.mp3',
  background: 'BG.png',
  stone: 'Stone.png',
  tileSheet: 'tiles.json',
  tileImage: 'tiles.png',
} as const

export const NEW_GAME_BUTTON = 'new_game'

export type Machine =
  | { readonly _tag: 'Ready'; readonly walk: Walk.Walk }
  | { readonly _tag: 'Walking'; readonly walk: Walk.Walk }
  | { readonly _tag: 'GameOver'; readonly walk: Walk.Walk; readonly newGame: Ui.ClickSignal }

export interface WalkTheDog {
  readonly machine: Machine
  readonly jumpSound: Audio.Sound
}

export type WalkTheDogError = AssetError | AudioError | UiError
export type Requirements = Assets.Tag | Audio.Tag | Ui.Tag

export const ready = (walk: Walk.Walk): Machine => ({ _tag: 'Ready', walk })

const requireFrames = (path: string, sheet: SpriteSheet.Sheet, names: ReadonlyArray<string>) => {
  const missing = SpriteSheet.missingFrames(sheet, names)
  return missing.length === 0
    ? Effect.void
    : Effect.fail(new AssetError({ path, reason: 'decode', message: `missing frames: ${missing.join(', ')}` }))
}

/**
 * Loads every asset, starts the music and returns the game in the Ready state.
 */
export const initialize: Effect.Effect<WalkTheDog, AssetError | AudioError, Assets.Tag | Audio.Tag> = Effect.gen(
  function* () {
    const audio = yield* Audio.Tag

    const boySheet = yield* SpriteSheet.loadSheet(GameAssets.boySheet)
    yield* requireFrames(GameAssets.boySheet, boySheet, RedHatBoy.requiredFrames())
    const boyImage = yield* Assets.loadImage(GameAssets.boyImage)

    const jumpSound = yield* audio.loadSound(GameAssets.jumpSound)
    const music = yield* audio.loadSound(GameAssets.music)
    yield* audio.playLooping(music)

    const background = yield* Assets.loadImage(GameAssets.background)
    const stone = yield* Assets.loadImage(GameAssets.stone)
    const tiles = yield* SpriteSheet.load(GameAssets.tileSheet, GameAssets.tileImage)
    yield* requireFrames(GameAssets.tileSheet, tiles.sheet, Segment.requiredTiles)

    yield* Effect.logInfo('assets loaded')
    const walk = Walk.make(RedHatBoy.make(boySheet, boyImage), { background, stone, tiles })
    return { machine: ready(walk), jumpSound }
  },
)

const playJump = (sound: Audio.Sound) =>
  Effect.flatMap(Audio.Tag, (audio) => audio.playSound(sound)).pipe(
    Effect.catchAll((error) => Effect.logWarning('jump sound failed', error)),
  )

const walking = (game: WalkTheDog, walk: Walk.Walk, keys: KeyState.KeyState) =>
  Effect.gen(function* () {
    const segment = Walk.needsSegment(walk) ? yield* Random.nextIntBetween(0, Segment.all.length) : 0
    const result = Walk.step(walk, keys, segment)
    if (result.jumped) {
      yield* playJump(game.jumpSound)
    }
    if (!Walk.knockedOut(result.walk)) {
      return { _tag: 'Walking', walk: result.walk } satisfies Machine
    }
    const ui = yield* Ui.Tag
    const newGame = yield* ui.showButton(NEW_GAME_BUTTON, 'New Game')
    yield* Effect.logInfo('game over')
    return { _tag: 'GameOver', walk: Walk.reset(result.walk), newGame } satisfies Machine
  })

const gameOver = (walk: Walk.Walk, newGame: Ui.ClickSignal) =>
  Effect.gen(function* () {
    const pressed = yield* newGame.pressed
    if (!pressed) {
      return { _tag: 'GameOver', walk, newGame } satisfies Machine
    }
    const ui = yield* Ui.Tag
    yield* ui.hide
    return ready(walk)
  })

export const transition = (
  game: WalkTheDog,
  keys: KeyState.KeyState,
): Effect.Effect<Machine, UiError, Audio.Tag | Ui.Tag> => {
  const { machine } = game
  switch (machine._tag) {
    case 'Ready': {
      const boy = RedHatBoy.update(machine.walk.boy)
      if (KeyState.isPressed(keys, 'ArrowRight')) {
        return Effect.succeed({
          _tag: 'Walking',
          walk: { ...machine.walk, boy: RedHatBoy.runRight(boy) },
        } satisfies Machine)
      }
      return Effect.succeed(ready({ ...machine.walk, boy }))
    }
    case 'Walking':
      return walking(game, machine.walk, keys)
    case 'GameOver':
      return gameOver(machine.walk, machine.newGame)
  }
}

export const update = (
  game: WalkTheDog,
  keys: KeyState.KeyState,
): Effect.Effect<WalkTheDog, UiError, Audio.Tag | Ui.Tag> =>
  Effect.map(transition(game, keys), (machine) => ({ ...game, machine }))

export const draw = (game: WalkTheDog, renderer: Renderer.Service): void => {
  renderer.clear(Geometry.rect(0, 0, RedHatBoy.HEIGHT, RedHatBoy.HEIGHT))
  Walk.draw(game.machine.walk, renderer)
}

export const game: Game<WalkTheDog, WalkTheDogError, Requirements> = { initialize, update, draw }
