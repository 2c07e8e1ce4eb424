import { Context, Effect, Layer } from 'effect'
import type { AssetError } from './Errors.js'
import type { ImageAsset } from './Image.js'
import { makeFetchAssets, type FetchAssetsOptions } from './internal/browser/fetchAssets.js'

export type { FetchAssetsOptions } from './internal/browser/fetchAssets.js'
export { resolvePath } from './internal/browser/fetchAssets.js'

export interface Service {
  readonly fetchJson: (path: string) => Effect.Effect<unknown, AssetError>
  readonly fetchArrayBuffer: (path: string) => Effect.Effect<ArrayBuffer, AssetError>
  readonly loadImage: (path: string) => Effect.Effect<ImageAsset, AssetError>
}

export class Tag extends Context.Tag('@walkdog/engine/Assets')<Tag, Service>() {}

export const browser = (options: FetchAssetsOptions): Service => makeFetchAssets(options)

export const layer = (options: FetchAssetsOptions): Layer.Layer<Tag> => Layer.succeed(Tag, browser(options))

export const fetchJson = (path: string): Effect.Effect<unknown, AssetError, Tag> =>
  Effect.flatMap(Tag, (assets) => assets.fetchJson(path))

export const loadImage = (path: string): Effect.Effect<ImageAsset, AssetError, Tag> =>
  Effect.flatMap(Tag, (assets) => assets.loadImage(path))
