import { Option } from 'effect'
import { Geometry, Image, SpriteSheet } from '@walkdog/engine'
import type { PlacedImage, Point, Rect, Renderer } from '@walkdog/engine'
import * as RedHatBoy from './RedHatBoy.js'

/** Something the boy runs into: knocks him out on contact. */
export interface Barrier {
  readonly _tag: 'Barrier'
  readonly image: PlacedImage
}

/**
 * A row of tiles the boy can land on. `boundingBoxes` are in world coordinates.
 */
export interface Platform {
  readonly _tag: 'Platform'
  readonly sheet: SpriteSheet.SpriteSheet
  readonly sprites: ReadonlyArray<SpriteSheet.Cell>
  readonly position: Point
  readonly boundingBoxes: ReadonlyArray<Rect>
}

export type Obstacle = Barrier | Platform

export const barrier = (image: PlacedImage): Barrier => ({ _tag: 'Barrier', image })

/**
 * `boundingBoxes` are relative to `position`. Sprite names the sheet does not have are skipped when drawing.
 */
export const platform = (
  sheet: SpriteSheet.SpriteSheet,
  position: Point,
  spriteNames: ReadonlyArray<string>,
  boundingBoxes: ReadonlyArray<Rect>,
): Platform => ({
  _tag: 'Platform',
  sheet,
  sprites: spriteNames.flatMap((name) => Option.toArray(SpriteSheet.cell(sheet, name))),
  position,
  boundingBoxes: boundingBoxes.map((box) =>
    Geometry.rect(box.position.x + position.x, box.position.y + position.y, box.width, box.height),
  ),
})

export const right = (obstacle: Obstacle): number => {
  switch (obstacle._tag) {
    case 'Barrier':
      return Image.right(obstacle.image)
    case 'Platform': {
      const last = obstacle.boundingBoxes.at(-1)
      return last === undefined ? 0 : Geometry.right(last)
    }
  }
}

export const moveHorizontally = (obstacle: Obstacle, dx: number): Obstacle => {
  switch (obstacle._tag) {
    case 'Barrier':
      return barrier(Image.moveHorizontally(obstacle.image, dx))
    case 'Platform':
      return {
        ...obstacle,
        position: { x: obstacle.position.x + dx, y: obstacle.position.y },
        boundingBoxes: obstacle.boundingBoxes.map((box) => Geometry.moveHorizontally(box, dx)),
      }
  }
}

/**
 * Returns the boy after touching `obstacle`: unchanged, landed on a platform, or knocked out.
 */
export const checkIntersection = (obstacle: Obstacle, boy: RedHatBoy.RedHatBoy): RedHatBoy.RedHatBoy => {
  const boyBox = RedHatBoy.boundingBox(boy)
  if (Option.isNone(boyBox)) {
    return boy
  }
  switch (obstacle._tag) {
    case 'Barrier':
      return Geometry.intersects(boyBox.value, obstacle.image.boundingBox) ? RedHatBoy.knockOut(boy) : boy
    case 'Platform': {
      const hit = obstacle.boundingBoxes.find((box) => Geometry.intersects(boyBox.value, box))
      if (hit === undefined) {
        return boy
      }
      // Only a falling boy that is still above the platform lands on it.
      return RedHatBoy.velocityY(boy) > 0 && RedHatBoy.posY(boy) < obstacle.position.y
        ? RedHatBoy.landOn(boy, Geometry.top(hit))
        : RedHatBoy.knockOut(boy)
    }
  }
}

export const draw = (obstacle: Obstacle, renderer: Renderer.Service): void => {
  switch (obstacle._tag) {
    case 'Barrier':
      Image.draw(obstacle.image, renderer)
      renderer.drawRect(obstacle.image.boundingBox)
      return
    case 'Platform': {
      let x = 0
      for (const sprite of obstacle.sprites) {
        SpriteSheet.draw(
          renderer,
          obstacle.sheet,
          SpriteSheet.toRect(sprite.frame),
          Geometry.rect(obstacle.position.x + x, obstacle.position.y, sprite.frame.w, sprite.frame.h),
        )
        x += sprite.frame.w
      }
      obstacle.boundingBoxes.forEach((box) => renderer.drawRect(box))
      return
    }
  }
}
