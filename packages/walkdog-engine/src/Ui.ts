import { Context, Effect, Layer } from 'effect'
import type { UiError } from './Errors.js'
import { makeDomUi, type DomUiOptions } from './internal/browser/domUi.js'

export type { DomUiOptions } from './internal/browser/domUi.js'

export interface ClickSignal {
  /** True when the element was clicked since the previous poll. */
  readonly pressed: Effect.Effect<boolean>
}

export interface Service {
  readonly showButton: (id: string, label: string) => Effect.Effect<ClickSignal, UiError>
  /** Empties the overlay and hands focus back to the canvas. */
  readonly hide: Effect.Effect<void, UiError>
}

export class Tag extends Context.Tag('@walkdog/engine/Ui')<Tag, Service>() {}

export const dom = (document: Document, options: DomUiOptions): Service => makeDomUi(document, options)

export const browserLayer = (document: Document, options: DomUiOptions): Layer.Layer<Tag> =>
  Layer.succeed(Tag, dom(document, options))
