/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency in the tsyringe container is keyed by one of
 * these symbols. They are grouped by architectural layer so it is easy to
 * see what exists at each level; a new repository or service gets its token
 * here first.
 */
export const TOKENS = {
  // Infrastructure — low-level tools the app needs to function
  Logger: Symbol.for('Logger'),
  ClientOptions: Symbol.for('ClientOptions'),
  HttpTransport: Symbol.for('HttpTransport'),
  ResponseCache: Symbol.for('ResponseCache'),

  // Services — application-level orchestrators
  ApiClient: Symbol.for('ApiClient'),
  PaginationWalker: Symbol.for('PaginationWalker'),
  FacetAttributeService: Symbol.for('FacetAttributeService'),
  TableService: Symbol.for('TableService'),
} as const;
