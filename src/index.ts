export * from './types/document';
export * from './types/takeoff';
export { config } from './config/env';
export type { EnvConfig } from './config/env';
export * from './config/project-config.schema';
export { defaultProjectConfig, defaultRatios } from './config/default-project-config';
export { loadProjectConfig, parseProjectConfig, resolveProjectConfig } from './config/project-config';
export * from './config/reference';
export * from './utils/count-snapshot';
export { TakeoffError, describeError } from './utils/takeoff-error';
export type { TakeoffErrorCode } from './utils/takeoff-error';
export { logger, createScopedLogger } from './utils/logger';
export type { ScopedLogger } from './utils/logger';
export * from './services/sheet-classification.service';
export * from './services/extraction/tag-extraction.service';
export * from './services/extraction/schedule-extraction.service';
export * from './services/geometry/conduit-estimation.service';
export * from './services/rules-engine.service';
export * from './services/validation.service';
export * from './services/vision/symbol-counter.service';
export { buildCountingInstructions } from './services/vision/counting-instructions';
export * from './services/ingest/pdf-ingest.service';
export { MemoryDocumentSource } from './services/ingest/memory-document-source';
export * from './services/takeoff-pipeline.service';
export * from './services/materials.service';
