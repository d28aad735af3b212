export { Htp1, MSO_PATHS } from './device/htp1';
export { MediaPlayer, VOLUME_STEP_DB, type PlayerState } from './device/media-player';
export { validateHost, type ProbeInput, type ProbeResult } from './device/probe';
export {
  DeviceConnection,
  type ConnectionStatus,
  type DeviceConnectionOptions,
  type HandlerErrorCallback,
} from './sync/device-connection';
export { Transaction } from './sync/transaction';
export { CONNECTION_SUBJECT, SubscriptionRegistry, type Subscriber } from './sync/subscriptions';
export { applyPatchOp, getAtPath, parsePath } from './sync/patch';
export type { DeviceSocket, DeviceTransport, Frame } from './sync/transport';
export { WsTransport, type WsTransportOptions } from './sync/ws-transport';
export {
  DEFAULT_CLIENT_CONFIG,
  loadClientConfig,
  type ClientConfig,
} from './config/client-config';
export { setDebugLogging } from './utils/logger';
export {
  AbortError,
  ConnectionError,
  DeviceStateError,
  Htp1Error,
  LookupError,
  PatchPathError,
  ProtocolError,
  TransactionError,
  UnsupportedPatchOpError,
} from './shared/errors';
export type {
  JsonObject,
  JsonValue,
  MsoChangeOp,
  MsoDocument,
  MsoPatchOp,
} from './shared/mso-types';
