export {
  processTags,
  compileTags,
  expandTags,
  parseTaggedKey,
  PROCESSOR_TAGS,
  type ProcessorTag,
  type MarkupRenderer,
  type LanguageVariantSet,
  type TagOptions,
  type CompiledNode,
  type CompiledMapping,
  type CompiledEntry,
} from "./processor.js";
