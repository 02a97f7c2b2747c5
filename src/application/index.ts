export { ConversationManager, type Conversation, type ConversationManagerConfig } from './ConversationManager.js';
export { DialogueStateMachine, matchClarificationChoice, type DialogueConfig } from './DialogueStateMachine.js';
export { EntityResolver, type EntityResolverConfig, type Resolution } from './EntityResolver.js';
export { KeyedMutex } from './KeyedMutex.js';
export { ResponseComposer, type ResponseComposerConfig } from './ResponseComposer.js';
export { RetrievalPipeline, type RetrievalPipelineConfig } from './RetrievalPipeline.js';
export { SlotStore } from './SlotStore.js';
export { CatalogValidationError, ToolRegistry, ToolResultCache } from './ToolRegistry.js';
export {
  IngestDocuments,
  type IngestDocumentsInput,
  type IngestDocumentsOutput,
} from './use-cases/IngestDocuments.js';
export { ProcessTurn, type ProcessTurnInput } from './use-cases/ProcessTurn.js';
