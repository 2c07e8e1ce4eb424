import type { Point, Rect } from '../../Geometry.js'
import type { ImageAsset } from '../../Image.js'
import type { CanvasOptions, Service } from '../../Renderer.js'

export type CanvasSurface = Pick<CanvasRenderingContext2D, 'clearRect' | 'drawImage' | 'strokeRect'>

export const makeCanvasRenderer = (surface: CanvasSurface, options: CanvasOptions): Service => ({
  clear: (area: Rect) => {
    surface.clearRect(area.position.x, area.position.y, area.width, area.height)
  },
  drawImage: (image: ImageAsset, frame: Rect, destination: Rect) => {
    surface.drawImage(
      image.source,
      frame.position.x,
      frame.position.y,
      frame.width,
      frame.height,
      destination.position.x,
      destination.position.y,
      destination.width,
      destination.height,
    )
  },
  drawEntireImage: (image: ImageAsset, position: Point) => {
    surface.drawImage(image.source, position.x, position.y)
  },
  drawRect: (boundingBox: Rect) => {
    if (!options.outlines) return
    surface.strokeRect(boundingBox.position.x, boundingBox.position.y, boundingBox.width, boundingBox.height)
  },
})
