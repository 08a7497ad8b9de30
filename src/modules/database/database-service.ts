/**
 * Engine store service used by createOrchestrator() and `loom init`.
 */

export type { DatabaseService } from '../../persistence/database.js'
export { SqliteDatabaseService, createDatabaseService } from '../../persistence/database.js'
