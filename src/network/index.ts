/**
 * Network Module
 * Wire protocol and transport for phone/watch communication
 */

// Errors
export {
  SyncErrorCode,
  SyncError,
  PeerError,
  DecodeError,
  StoreError,
  Errors,
  ErrorReport,
  toErrorReport,
  isSyncError,
} from './NetworkErrors';

// Transport contract
export {
  NodeId,
  PeerNode,
  MessageEvent,
  DataMapValue,
  DataMap,
  DataItem,
  DataEventType,
  DataEvent,
  MessageListener,
  DataListener,
  Unsubscribe,
  DataLayerClient,
  textToBytes,
  bytesToText,
  EMPTY_PAYLOAD,
} from './DataLayer';

// Protocol
export {
  MessageName,
  MESSAGE_NAMES,
  DEFAULT_PATH_PREFIX,
  SNAPSHOT_DATA_KEY,
  SNAPSHOT_TIMESTAMP_KEY,
  messagePath,
  parseMessagePath,
  SyncRequestMessage,
  ItemCheckedMessage,
  ItemUncheckedMessage,
  ItemAddedMessage,
  RefreshRequiredMessage,
  WatchToPhoneMessage,
  PhoneToWatchMessage,
  WatchMessage,
  EncodedMessage,
  DEFAULT_ADD_QUANTITY,
  DEFAULT_ADD_UNIT,
  createSyncRequest,
  createToggleMessage,
  createItemAdded,
  createRefreshRequired,
  formatDecimal,
  parseDecimal,
  ActionPayload,
  encodeActionPayload,
  decodeActionPayload,
  encodeMessage,
  decodeMessage,
  isWatchToPhoneMessage,
  isToggleMessage,
} from './Protocol';

// In-memory transport
export {
  MemoryDataLayerNetwork,
  SentMessageRecord,
  createMemoryDataLayerNetwork,
} from './MemoryDataLayer';
