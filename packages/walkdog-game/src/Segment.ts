import { Geometry, Image } from '@walkdog/engine'
import type { ImageAsset, Rect, SpriteSheet } from '@walkdog/engine'
import * as Obstacle from './Obstacle.js'

const STONE_ON_GROUND = 550
const INITIAL_STONE_OFFSET = 150

const FIRST_PLATFORM = 370
const LOW_PLATFORM = 420
const HIGH_PLATFORM = 375

const FLOATING_PLATFORM_SPRITES = ['13.png', '14.png', '15.png'] as const
const CLIFF_PLATFORM_SPRITES = ['1.png', '1.png', '3.png'] as const

// Left edge, walkable middle, right edge.
const PLATFORM_BOXES: ReadonlyArray<Rect> = [
  Geometry.rect(0, 0, 60, 54),
  Geometry.rect(60, 0, 384 - 120, 93),
  Geometry.rect(384 - 60, 0, 60, 54),
]

export interface SegmentAssets {
  readonly stone: ImageAsset
  readonly tiles: SpriteSheet.SpriteSheet
}

/** Builds a stretch of obstacles starting at world x `offsetX`. */
export type Segment = (assets: SegmentAssets, offsetX: number) => ReadonlyArray<Obstacle.Obstacle>

const floatingPlatform = (tiles: SpriteSheet.SpriteSheet, x: number, y: number): Obstacle.Platform =>
  Obstacle.platform(tiles, Geometry.point(x, y), FLOATING_PLATFORM_SPRITES, PLATFORM_BOXES)

const cliffPlatform = (tiles: SpriteSheet.SpriteSheet, x: number, y: number): Obstacle.Platform =>
  Obstacle.platform(tiles, Geometry.point(x, y), CLIFF_PLATFORM_SPRITES, PLATFORM_BOXES)

export const stoneAndPlatform: Segment = ({ stone, tiles }, offsetX) => [
  Obstacle.barrier(Image.place(stone, Geometry.point(offsetX + INITIAL_STONE_OFFSET, STONE_ON_GROUND))),
  floatingPlatform(tiles, offsetX + FIRST_PLATFORM, LOW_PLATFORM),
]

export const otherPlatform: Segment = ({ tiles }, offsetX) => [
  cliffPlatform(tiles, offsetX + FIRST_PLATFORM, HIGH_PLATFORM),
]

/** Segments picked at random as the walk needs more obstacles. */
export const all: ReadonlyArray<Segment> = [stoneAndPlatform, otherPlatform]

/** Tile names the segments draw from the tile sheet. */
export const requiredTiles: ReadonlyArray<string> = Array.from(
  new Set([...FLOATING_PLATFORM_SPRITES, ...CLIFF_PLATFORM_SPRITES]),
)
