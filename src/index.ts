export * from './validators/index.js';
export { FieldCheck } from './core/fieldcheck.js';
export type { CheckedValue, FieldCheckDependencies } from './core/fieldcheck.js';
export { toErrorResponse, statusForCategory } from './core/http.js';
export type { ErrorResponse, ErrorStatus } from './core/http.js';

export { DnsMxResolver } from './services/dns.js';
export type { DnsMxResolverOptions } from './services/dns.js';
export { ImageDataDecoder } from './services/image.js';
export { BufferFileSource, uploadedFile, fileFromPath } from './services/file-source.js';

export { ConfigManager, resolveConfig, readEnvOverrides } from './config.js';
export { SecureError, ErrorHandler, withErrorHandling } from './utils/error-handler.js';

export * from './types/validation.js';
export type * from './types/collaborators.js';
export type * from './types/common.js';
export * from './types/error-handler.js';
