export type KeyPress =
  | { readonly _tag: 'KeyDown'; readonly code: string }
  | { readonly _tag: 'KeyUp'; readonly code: string }

export interface KeyState {
  readonly pressed: ReadonlySet<string>
}

export const empty: KeyState = { pressed: new Set() }

export const keyDown = (code: string): KeyPress => ({ _tag: 'KeyDown', code })

export const keyUp = (code: string): KeyPress => ({ _tag: 'KeyUp', code })

export const apply = (state: KeyState, press: KeyPress): KeyState => {
  const has = state.pressed.has(press.code)
  if (press._tag === 'KeyDown' && has) return state
  if (press._tag === 'KeyUp' && !has) return state

  const next = new Set(state.pressed)
  if (press._tag === 'KeyDown') {
    next.add(press.code)
  } else {
    next.delete(press.code)
  }
  return { pressed: next }
}

export const applyAll = (state: KeyState, presses: Iterable<KeyPress>): KeyState => {
  let current = state
  for (const press of presses) {
    current = apply(current, press)
  }
  return current
}

export const isPressed = (state: KeyState, code: string): boolean => state.pressed.has(code)

export const fromPressed = (...codes: ReadonlyArray<string>): KeyState => ({ pressed: new Set(codes) })
