/** Pipeline: Barrel Export */
export { wrapCodeBlocks, mean } from './BlockWrapper.js';
export type { WrapResult } from './BlockWrapper.js';
export { processStringField, interpretEscapedNewlines, reescapeNewlines } from './StringFieldProcessor.js';
export type { FieldResult } from './StringFieldProcessor.js';
export { parseJsonDocument, serializeJsonNode } from './JsonDocument.js';
export type {
    JsonNode, JsonObjectNode, JsonArrayNode, JsonStringNode, JsonScalarNode, JsonEntry, ParseJsonOptions,
} from './JsonDocument.js';
export { walkJson } from './JsonTreeWalker.js';
export type { WalkOptions, WalkResult } from './JsonTreeWalker.js';
export { WorkerPool } from './WorkerPool.js';
export type { WorkerPoolOptions } from './WorkerPool.js';
export { scanDanger } from './PipelineContext.js';
export type { PipelineContext } from './PipelineContext.js';
