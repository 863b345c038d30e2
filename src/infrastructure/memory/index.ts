export { InMemoryPipelineRepository } from './pipeline-repository.js';
export { InMemoryAlertRepository } from './alert-repository.js';
