/**
 * Error codes nodemailer and Node sockets use when the connection itself
 * failed, as opposed to the server refusing a command.
 */
export const CONNECTION_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNECTION',
  'ETIMEDOUT',
  'ESOCKET',
  'ECONNRESET',
  'ECONNREFUSED',
  'EPIPE',
  'EDNS',
  'ETLS',
]);
