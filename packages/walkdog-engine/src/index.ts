// Public barrel for @walkdog/engine
//   import * as Engine from "@walkdog/engine"

// Pure building blocks
export * as Geometry from './Geometry.js'
export type { Point, Rect } from './Geometry.js'
export * as KeyState from './KeyState.js'
export * as Image from './Image.js'
export type { ImageAsset, PlacedImage } from './Image.js'
export * as SpriteSheet from './SpriteSheet.js'

// Services
export * as Renderer from './Renderer.js'
export * as Keyboard from './Keyboard.js'
export * as AnimationFrames from './AnimationFrames.js'
export * as Assets from './Assets.js'
export * as Audio from './Audio.js'
export * as Ui from './Ui.js'

// Loop, wiring and ambient concerns
export * as GameLoop from './GameLoop.js'
export type { Game } from './GameLoop.js'
export * as Browser from './Browser.js'
export * from './Config.js'
export * as Logging from './Logging.js'
export * from './Errors.js'
