export { pipelineItems, alerts, eventLog } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, SqlClient } from './client.js';
export { ensureSchema } from './ensure-schema.js';
export { DrizzlePipelineRepository } from './pipeline-repository.js';
export { DrizzleAlertRepository } from './alert-repository.js';
export { DrizzleEventLog } from './event-log.js';
