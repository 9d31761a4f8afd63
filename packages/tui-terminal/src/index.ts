/**
 * Terminal dashboard for winget packages
 *
 * This package holds the coordination layer and the terminal front end:
 * - Application state and the pure reducer that advances it
 * - Operation dispatcher running backend calls off the input loop
 * - Input decoding and mapping, including mouse hit-testing
 * - Snapshot projection and frame rendering
 * - Terminal screen handling and the app runner
 */

// State machine
export * from './state.js'
export * from './messages.js'
export { apply, type Transition } from './reducer.js'

// Operations
export { OperationDispatcher, type DispatcherOptions, type OperationHandle } from './dispatcher.js'
export { AppController, type AppControllerOptions } from './controller.js'

// Input
export * from './keys.js'
export { mapInput, type InputContext } from './input.js'

// Rendering
export * from './layout.js'
export * from './snapshot.js'
export { render, effectiveScroll, type RenderResult, type TerminalSize } from './renderer.js'
export { Screen } from './screen.js'

// Main app runner
export { tuiUI, inputContext } from './app.js'

// Types and interfaces
export type { TuiDependencies } from './app.js'
