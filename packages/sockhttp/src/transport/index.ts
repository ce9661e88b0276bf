export { connect, DEFAULT_TIMEOUT_MS } from './connect.js';
export { establishTunnel, buildConnectRequest } from './proxy-tunnel.js';
export { createSocketTransport, openSocket, upgradeTls } from './socket-transport.js';
export { createByteReader } from './byte-reader.js';
export type { Transport, Connector, ConnectOptions } from './types.js';
export type { SocketTransport, SocketTransportOptions, UpgradeTlsOptions } from './socket-transport.js';
export type { Tunnel, TunnelTarget } from './proxy-tunnel.js';
export type { ByteReader } from './byte-reader.js';
