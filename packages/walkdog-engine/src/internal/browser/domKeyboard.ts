import { keyDown, keyUp, type KeyPress } from '../../KeyState.js'

const codeOf = (event: Event): string | undefined => {
  if (!('code' in event)) return undefined
  return typeof event.code === 'string' ? event.code : undefined
}

/**
 * Registers keydown/keyup listeners and returns the function that removes them.
 */
export const listenKeyboard = (target: EventTarget, push: (press: KeyPress) => void): (() => void) => {
  const onKeyDown = (event: Event) => {
    const code = codeOf(event)
    if (code !== undefined) push(keyDown(code))
  }
  const onKeyUp = (event: Event) => {
    const code = codeOf(event)
    if (code !== undefined) push(keyUp(code))
  }
  target.addEventListener('keydown', onKeyDown)
  target.addEventListener('keyup', onKeyUp)
  return () => {
    target.removeEventListener('keydown', onKeyDown)
    target.removeEventListener('keyup', onKeyUp)
  }
}
