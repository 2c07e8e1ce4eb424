import * as Geometry from './Geometry.js'
import type { Point, Rect } from './Geometry.js'
import type { Service as RendererService } from './Renderer.js'

/**
 * A loaded image. `source` is whatever the canvas can draw (an `<img>`, a canvas, a bitmap).
 */
export interface ImageAsset {
  readonly source: CanvasImageSource
  readonly width: number
  readonly height: number
}

/**
 * An image placed in the world, with a bounding box the size of the whole image.
 */
export interface PlacedImage {
  readonly asset: ImageAsset
  readonly position: Point
  readonly boundingBox: Rect
}

export const place = (asset: ImageAsset, position: Point): PlacedImage => ({
  asset,
  position,
  boundingBox: Geometry.rect(position.x, position.y, asset.width, asset.height),
})

export const draw = (image: PlacedImage, renderer: RendererService): void => {
  renderer.drawEntireImage(image.asset, image.position)
}

export const setX = (image: PlacedImage, x: number): PlacedImage => ({
  ...image,
  position: { x, y: image.position.y },
  boundingBox: Geometry.setX(image.boundingBox, x),
})

export const moveHorizontally = (image: PlacedImage, dx: number): PlacedImage => setX(image, image.position.x + dx)

export const right = (image: PlacedImage): number => Geometry.right(image.boundingBox)
