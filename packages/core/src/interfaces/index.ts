export type { Logger } from './logger.js';
export type { HttpResponse, PreparedBody, PreparedRequest, Transport } from './transport.js';
