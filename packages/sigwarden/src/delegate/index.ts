/**
 * Delegate implementations barrel export.
 */

export { AutoAcceptDelegate, AutoRejectDelegate } from './auto.js'
export { InteractivePromptDelegate } from './interactive.js'
export type { InteractivePromptOptions } from './interactive.js'
