export type { SearchRequest, SourceConnector } from './types.js';
export { MemoryConnector, memoryIdentifier } from './memory-connector.js';
export { VectorConnector, distanceToSimilarity } from './vector-connector.js';
export { GraphConnector } from './graph-connector.js';
export { ConversationConnector, conversationIdentifier } from './conversation-connector.js';
export type { ConversationHistorySource } from './conversation-connector.js';
export { gatherCandidates } from './fan-out.js';
export type { FanOutOptions } from './fan-out.js';
