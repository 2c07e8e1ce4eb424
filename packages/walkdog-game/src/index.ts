// Public barrel for @walkdog/game
export * as RedHatBoy from './RedHatBoy.js'
export * as Obstacle from './Obstacle.js'
export * as Segment from './Segment.js'
export * as Walk from './Walk.js'
export * as WalkTheDog from './WalkTheDog.js'
