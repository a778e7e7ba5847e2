export { createRelayServer, type RelayServer, type RelayServerOptions } from './server.js';
export { registerRoutes } from './routes.js';
export { registerWebSocket } from './websocket.js';
