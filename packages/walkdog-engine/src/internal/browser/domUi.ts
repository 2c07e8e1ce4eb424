import { Effect, Option, Queue } from 'effect'
import { UiError } from '../../Errors.js'
import type { ClickSignal, Service } from '../../Ui.js'

export interface DomUiOptions {
  readonly uiId: string
  readonly canvasId: string
}

export const makeDomUi = (document: Document, options: DomUiOptions): Service => {
  const overlay = Effect.suspend(() => {
    const root = document.getElementById(options.uiId)
    return root === null
      ? Effect.fail(new UiError({ elementId: options.uiId, message: `UI overlay #${options.uiId} not found` }))
      : Effect.succeed(root)
  })

  const showButton = (id: string, label: string): Effect.Effect<ClickSignal, UiError> =>
    Effect.gen(function* () {
      const root = yield* overlay
      const clicks = yield* Queue.unbounded<void>()
      const button = document.createElement('button')
      button.id = id
      button.textContent = label
      button.addEventListener('click', () => {
        Queue.unsafeOffer(clicks, undefined)
      })
      root.insertBefore(button, root.firstChild)
      return { pressed: Queue.poll(clicks).pipe(Effect.map(Option.isSome)) }
    })

  const hide: Effect.Effect<void, UiError> = Effect.gen(function* () {
    const root = yield* overlay
    while (root.firstChild !== null) {
      root.removeChild(root.firstChild)
    }
    const canvas = document.getElementById(options.canvasId)
    if (canvas !== null) {
      canvas.focus()
    }
  })

  return { showButton, hide }
}
