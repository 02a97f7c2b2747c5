export * from './entities/AgentAction.js';
export * from './entities/DialogueState.js';
export * from './entities/DocumentChunk.js';
export * from './entities/IntentSchema.js';
export * from './entities/Slot.js';
export * from './entities/ToolResult.js';
export * from './entities/Turn.js';
export type { IConversationService } from './ports/IConversationService.js';
export type { IEmbeddingService } from './ports/IEmbeddingService.js';
export type { IGenerationService } from './ports/IGenerationService.js';
export type { GeocodedPlace, IGeocoder } from './ports/IGeocoder.js';
export type { ILogger, LogData, LogLevel } from './ports/ILogger.js';
export type { INluClassifier } from './ports/INluClassifier.js';
export { ToolInputError, type IToolHandler, type ToolInputs } from './ports/IToolHandler.js';
export type { IVectorIndex } from './ports/IVectorIndex.js';
