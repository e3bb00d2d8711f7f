export { DashboardReconciler, matchBlocks, type ReconcilerOptions } from './reconciler.js';
export {
  SessionPublisher,
  sessionPageProperties,
  type SessionPublisherOptions,
  type SessionSource,
} from './session-publisher.js';
export { NotionDocumentStore, toRichText, blockText, type NotionStoreOptions } from './notion-store.js';
export {
  DEFAULT_TITLE,
  NO_PROCESSES_LINE,
  buildDashboard,
  buildSections,
  formatHeader,
  headerPrefix,
  formatSection,
  formatTimestamp,
  sectionMarker,
} from './model.js';
export {
  BLOCK_TYPES,
  DEFAULT_PROTECTED_TYPES,
  type BlockContent,
  type BlockMapping,
  type DashboardDocument,
  type DashboardSection,
  type DatabasePageWriter,
  type MatchOutcome,
  type PublishResult,
  type ReconcileResult,
  type ReconcileStatus,
  type RemoteBlock,
  type RemoteDocumentStore,
} from './types.js';
