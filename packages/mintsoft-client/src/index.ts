// ─────────────────────────────────────────────────────────────
// Mintsoft Client Library
// TypeScript SDK for the Mintsoft warehouse management API
// ─────────────────────────────────────────────────────────────

// Clients
export { AuthClient } from './auth-client.js';
export { MintsoftClient } from './client.js';

// ─────────────────────────────────────────────────────────────
// Resources
// ─────────────────────────────────────────────────────────────
export { AuthResource, getCredentialsFromEnv } from './auth.js';
export { OrdersResource } from './orders.js';
export { formatItemPayload, ReturnsResource } from './returns.js';
export {
    BaseResource,
    classifyError,
    isSuccess,
    type ConnectionProvider
} from './resource.js';

// ─────────────────────────────────────────────────────────────
// Response Objects
// ─────────────────────────────────────────────────────────────
export {
    jsonObjectSchema,
    jsonValueSchema,
    normalizeKey,
    Order,
    ResponseObject,
    Return,
    ReturnReason,
    type ReadonlyJsonObject,
    type ReadonlyJsonValue,
    type ResponseValue
} from './response-object.js';

// ─────────────────────────────────────────────────────────────
// HTTP & Configuration
// ─────────────────────────────────────────────────────────────
export { Connection, HttpGateway, type GatewayConfig } from './gateway.js';
export { clientOptionsSchema, authClientOptionsSchema } from './config.js';
export { createLogger, type LoggerConfig } from './logger.js';

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────
export type {
    AuthClientOptions,
    BaseClientOptions,
    ClientOptions,
    ConnectionOptions,
    Credentials,
    HttpResponse,
    Identifier,
    JsonObject,
    JsonValue,
    QueryParams,
    ReturnItemAttributes
} from './types.js';

export { BASE_URL, ENDPOINTS } from './types.js';

// ─────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────
export {
    APIError,
    AuthenticationError,
    MintsoftError,
    NotFoundError,
    ValidationError,
    type MintsoftErrorOptions
} from './errors.js';
