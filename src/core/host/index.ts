/**
 * Host Module - session hosting primitives
 *
 * - SessionRegistry: interface for session lifecycle and admission control
 * - StreamingGateway: relays a session's event bus to client connections
 * - ClientConnection: what a transport must provide to receive a stream
 *
 * For a ready-made runtime, use createSessionRuntime() from the main module.
 */

export type { SessionRegistry } from './session-registry.js';

export { StreamingGateway } from './streaming-gateway.js';
export type { Attachment } from './streaming-gateway.js';

export { MockClientConnection } from './client-connection.js';
export type { ClientConnection, StreamEndInfo } from './client-connection.js';
