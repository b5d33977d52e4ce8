export { default as databaseConfig } from './database.config';
export { default as mailConfig } from './mail.config';
export { default as pipelineConfig, PIPELINE_DRIVERS, resolvePipelineDrivers } from './pipeline.config';
export type { NotifierDriver, PipelineConfig, PipelineDrivers, QueueDriver, StoreDriver } from './pipeline.config';
export { validate } from './env-validation';
