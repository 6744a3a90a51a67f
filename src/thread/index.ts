export { DocumentBuffer, InsertionMarker, escapeHeadingStars } from './buffer.js';
export type { DocumentBufferOptions, InsertEvent, InsertionMarkerOptions } from './buffer.js';
export { appendTopLevelHeading, buildThreadText } from './edit.js';
export { collectAncestors, extractEntry, stripMetadataBlock } from './entry.js';
export {
  ConfigurationError,
  OutlineChatError,
  StructuralError,
  TransportError,
  describeError,
} from './errors.js';
export { buildMessages } from './messages.js';
export type {
  AncestorChain,
  DocumentNode,
  Entry,
  Message,
  MessageRole,
  ParsedOutline,
  RoleConfiguration,
} from './model.js';
export { findLastNode, findNodeAtLine, parseOutline, stripHeadingDecoration } from './parse.js';
export {
  DEFAULT_REGION_FILTERS,
  encloseInCodeBlock,
  ensureTrailingNewline,
  quoteRegion,
  resolveRegionFilters,
  resolveSourceContext,
} from './quote.js';
export type { RegionFilter, RegionFilterName, SourceContext, SourceKind } from './quote.js';
export { respond } from './respond.js';
export type { RespondOptions, ResponseHandle } from './respond.js';
export type { Transport } from '../transport/types.js';
