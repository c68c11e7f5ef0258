/**
 * @taskdesk/core
 *
 * Framework-agnostic task synchronization engine.
 * Provides credential lifecycle, the remote task client contract, the
 * authenticated executor, the task tree model and the session dispatcher.
 */

export * from './common/index.js'
export * from './credentials/index.js'
export * from './remote/index.js'
export * from './sync/index.js'
export * from './config/index.js'
