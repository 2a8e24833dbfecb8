export {
  operationParams,
  isOperationName,
  OPERATION_NAMES,
  DOCUMENT_OPERATIONS,
  CHANNEL_OPERATIONS,
  DEFAULT_OPERATION_TOOLS,
} from './operations';
export type { OperationName, OperationParams } from './operations';
export { CapabilityRegistry } from './registry';
export type { ProviderHandle, CapabilityResult, CapabilityInvoker } from './registry';
export { RemoteDocumentStore, RemoteChatChannel, clearStaleAcks } from './stores';
export type {
  Comment,
  CommentReply,
  ChannelMessage,
  DocumentStore,
  CommentStore,
  ChatChannel,
} from './stores';
export { OWN_REPLY_MARKER, ACK_REPLY, ACK_REACTION, isOwnReply, markOwnReply } from './markers';
