/**
 * @file Query Module Exports
 *
 * @module @docsync/collection-sync/query
 */

export { runSnapshotQuery, compareFieldValues } from './snapshot-query.js'
