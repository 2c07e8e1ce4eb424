import { Context, Layer } from 'effect'
import type { Point, Rect } from './Geometry.js'
import type { ImageAsset } from './Image.js'
import { makeCanvasRenderer, type CanvasSurface } from './internal/browser/canvasRenderer.js'

export type { CanvasSurface } from './internal/browser/canvasRenderer.js'

/**
 * Renderer.Service: synchronous drawing surface handed to `Game.draw` once per frame.
 */
export interface Service {
  readonly clear: (area: Rect) => void
  readonly drawImage: (image: ImageAsset, frame: Rect, destination: Rect) => void
  readonly drawEntireImage: (image: ImageAsset, position: Point) => void
  /** Debug outline; only drawn when the renderer was built with `outlines: true`. */
  readonly drawRect: (boundingBox: Rect) => void
}

export class Tag extends Context.Tag('@walkdog/engine/Renderer')<Tag, Service>() {}

export interface CanvasOptions {
  readonly outlines: boolean
}

export const canvas = (surface: CanvasSurface, options: CanvasOptions): Service => makeCanvasRenderer(surface, options)

export const layer = (surface: CanvasSurface, options: CanvasOptions): Layer.Layer<Tag> =>
  Layer.succeed(Tag, canvas(surface, options))
