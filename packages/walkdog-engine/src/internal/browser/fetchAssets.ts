import { Effect } from 'effect'
import type { Service } from '../../Assets.js'
import { AssetError, messageOf } from '../../Errors.js'
import type { ImageAsset } from '../../Image.js'

export interface FetchAssetsOptions {
  readonly baseUrl: string
  readonly fetch?: (url: string, init?: RequestInit) => Promise<Response>
  readonly createImage?: () => HTMLImageElement
}

/**
 * Joins an asset path onto a base URL. An empty base leaves the path relative to the page.
 */
export const resolvePath = (baseUrl: string, path: string): string => {
  if (baseUrl.length === 0) return path
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`
}

export const makeFetchAssets = (options: FetchAssetsOptions): Service => {
  const doFetch = options.fetch ?? ((url: string, init?: RequestInit) => globalThis.fetch(url, init))
  const createImage = options.createImage ?? (() => new Image())

  const fetchResponse = (path: string): Effect.Effect<Response, AssetError> => {
    const url = resolvePath(options.baseUrl, path)
    return Effect.tryPromise({
      try: (signal) => doFetch(url, { signal }),
      catch: (cause) => new AssetError({ path, reason: 'fetch', message: `fetch failed: ${messageOf(cause)}`, cause }),
    }).pipe(
      Effect.filterOrFail(
        (response) => response.ok,
        (response) =>
          new AssetError({ path, reason: 'fetch', message: `fetch failed: ${String(response.status)} (${url})` }),
      ),
    )
  }

  const fetchJson = (path: string): Effect.Effect<unknown, AssetError> =>
    fetchResponse(path).pipe(
      Effect.flatMap((response) =>
        Effect.tryPromise({
          try: (): Promise<unknown> => response.json(),
          catch: (cause) => new AssetError({ path, reason: 'decode', message: `invalid JSON: ${messageOf(cause)}`, cause }),
        }),
      ),
    )

  const fetchArrayBuffer = (path: string): Effect.Effect<ArrayBuffer, AssetError> =>
    fetchResponse(path).pipe(
      Effect.flatMap((response) =>
        Effect.tryPromise({
          try: () => response.arrayBuffer(),
          catch: (cause) => new AssetError({ path, reason: 'decode', message: messageOf(cause), cause }),
        }),
      ),
    )

  const loadImage = (path: string): Effect.Effect<ImageAsset, AssetError> =>
    Effect.async<ImageAsset, AssetError>((resume) => {
      const url = resolvePath(options.baseUrl, path)
      const image = createImage()
      const detach = () => {
        image.removeEventListener('load', onLoad)
        image.removeEventListener('error', onError)
      }
      const onLoad = () => {
        detach()
        resume(Effect.succeed({ source: image, width: image.width, height: image.height }))
      }
      const onError = () => {
        detach()
        resume(Effect.fail(new AssetError({ path, reason: 'image', message: `Error loading image ${url}` })))
      }
      image.addEventListener('load', onLoad)
      image.addEventListener('error', onError)
      image.src = url
      return Effect.sync(detach)
    })

  return { fetchJson, fetchArrayBuffer, loadImage }
}
