/**
 * @gantry/dispatcher - embeddable runner selection
 *
 * ```ts
 * const dispatcher = await createDispatcher(loadConfig(), await loadFleetFile('fleet.json'));
 * const { runnerKey, explanation } = await dispatcher.selector.selectRunner({ tags: ['docker'] });
 * ```
 */

export { createDispatcher, type Dispatcher, type DispatcherOverrides } from './dispatcher.js';

export * from './ontology/index.js';
export * from './parser/index.js';
export * from './solver/index.js';
export * from './bandit/index.js';
export * from './state/index.js';
export * from './availability/index.js';
export * from './lifecycle/index.js';
export * from './selector/index.js';
export * from './events/index.js';
export * from './config/index.js';
export * from './errors.js';

export { createExpressApp, startServer, type ExpressAppOptions } from './api/index.js';
