export * from './schemas/types';
export { PipelineBus } from './pubsub/bus';
export { attachAudit, logAction } from './audit/audit';
export { createLogger, resolveLogLevel, type Logger } from './logger';
export { DatasetError, ConfigError, CompletionError, describeError } from './errors';
export { ConstituentTable, type SectorPatch } from './table/ConstituentTable';
export { renderTable } from './table/render';
