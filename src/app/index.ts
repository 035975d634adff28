/**
 * Composition root exports
 */

export { createContainer, createRelayController } from './container';
export type { Deps, DepsOverrides } from './container';
export { createInterruptContext, INTERRUPT_SIGNALS } from './interrupts';
export type { InterruptContext, InterruptContextOptions, SignalSource } from './interrupts';
