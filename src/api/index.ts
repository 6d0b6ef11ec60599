/**
 * API module
 * @module api
 */

export { ChatServer, BadRequestError, MAX_INPUT_LENGTH } from './chat-server.js';
export type { ChatServerOptions, ChatReply } from './chat-server.js';
