export { TransportSession, DEFAULT_SESSION_OPTIONS, type SessionOptions, type SessionState } from './session/transport-session.js';
export {
  PauseResumeController,
  processLifecycle,
  type HostLifecycle,
  type PausableSession,
  type ProcessLifecycleOptions,
} from './session/lifecycle.js';
export {
  EventDelegator,
  onRequest,
  onResponse,
  type BindingKind,
  type PayloadSchema,
  type RequestCallback,
  type ResponseCallback,
  type TopicBinding,
} from './dispatch/event-delegator.js';
export {
  ackEnvelope,
  createEnvelope,
  envelopeSchema,
  subscribeEnvelope,
  type Envelope,
  type EnvelopeType,
  type KnownEnvelopeType,
} from './protocol/types.js';
export { decodeEnvelope, encodeEnvelope } from './protocol/codec.js';
export * from './protocol/json-rpc.js';
export {
  ABNORMAL_CLOSE_CODE,
  CLEAN_CLOSE_CODES,
  isAbnormalClose,
  type ConnectionFactory,
  type ConnectionHandle,
  type ConnectionOptions,
  type ConnectionState,
} from './transports/types.js';
export { WebSocketConnection, createWebSocketConnection } from './transports/websocket-connection.js';
export { normalizeSocketUrl } from './transports/url.js';
export { loadSessionConfig, sessionConfigSchema, type LoadConfigOptions, type SessionConfig } from './config/session-config.js';
export * from './utils/errors.js';
export { configure as configureLogging, createLogger, setLogSink, type LogLevel, type LogSink } from './utils/logger.js';
