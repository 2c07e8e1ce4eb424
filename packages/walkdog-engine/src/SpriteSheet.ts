import { Effect, Option, ParseResult, Schema } from 'effect'
import * as Assets from './Assets.js'
import { AssetError } from './Errors.js'
import * as Geometry from './Geometry.js'
import type { Rect } from './Geometry.js'
import type { ImageAsset } from './Image.js'
import type { Service as RendererService } from './Renderer.js'

/**
 * Sprite-sheet JSON as exported by TexturePacker ("JSON hash" format).
 * Only the fields the game reads are declared; the rest are ignored on decode.
 */
export const SheetRect = Schema.Struct({
  x: Schema.Number,
  y: Schema.Number,
  w: Schema.Number,
  h: Schema.Number,
})
export type SheetRect = typeof SheetRect.Type

export const Cell = Schema.Struct({
  frame: SheetRect,
  spriteSourceSize: SheetRect,
})
export type Cell = typeof Cell.Type

export const Sheet = Schema.Struct({
  frames: Schema.Record({ key: Schema.String, value: Cell }),
})
export type Sheet = typeof Sheet.Type

export interface SpriteSheet {
  readonly sheet: Sheet
  readonly image: ImageAsset
}

export const make = (sheet: Sheet, image: ImageAsset): SpriteSheet => ({ sheet, image })

export const decodeSheet = (path: string, json: unknown): Effect.Effect<Sheet, AssetError> =>
  Schema.decodeUnknown(Sheet)(json).pipe(
    Effect.mapError(
      (error) =>
        new AssetError({
          path,
          reason: 'decode',
          message: ParseResult.TreeFormatter.formatErrorSync(error),
          cause: error,
        }),
    ),
  )

export const loadSheet = (path: string): Effect.Effect<Sheet, AssetError, Assets.Tag> =>
  Assets.fetchJson(path).pipe(Effect.flatMap((json) => decodeSheet(path, json)))

export const load = (jsonPath: string, imagePath: string): Effect.Effect<SpriteSheet, AssetError, Assets.Tag> =>
  Effect.all({ sheet: loadSheet(jsonPath), image: Assets.loadImage(imagePath) }).pipe(
    Effect.map(({ sheet, image }) => make(sheet, image)),
  )

export const lookup = (sheet: Sheet, name: string): Option.Option<Cell> =>
  Object.prototype.hasOwnProperty.call(sheet.frames, name) ? Option.some(sheet.frames[name]) : Option.none()

export const cell = (spriteSheet: SpriteSheet, name: string): Option.Option<Cell> => lookup(spriteSheet.sheet, name)

/** Names from `names` that the sheet has no frame for, in input order. */
export const missingFrames = (sheet: Sheet, names: Iterable<string>): ReadonlyArray<string> =>
  Array.from(names).filter((name) => Option.isNone(lookup(sheet, name)))

export const toRect = (r: SheetRect): Rect => Geometry.rect(r.x, r.y, r.w, r.h)

export const draw = (renderer: RendererService, spriteSheet: SpriteSheet, source: Rect, destination: Rect): void => {
  renderer.drawImage(spriteSheet.image, source, destination)
}
