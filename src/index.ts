/**
 * hslab - selection algebra, type descriptors and chunked transfers for
 * remote N-dimensional arrays
 */

export { RemoteArray } from './RemoteArray.js';
export type { TransferOptions, ChunkData } from './RemoteArray.js';
export { MultiManager } from './MultiManager.js';
export type { MultiManagerOptions, FanoutExpression } from './MultiManager.js';
export * from './types.js';
export * from './errors.js';
export * from './utils.js';
export * from './core/dtype.js';
export * from './core/type-codec.js';
export * from './core/selection.js';
export { ChunkIterator, guessChunk } from './core/chunk-iterator.js';
export { arrayToBytes, bytesToArray, jsonToArray } from './core/element-codec.js';
export { ConnectionRegistry, parseObjectRef } from './core/registry.js';
export type { ConnectionHandle, Closeable } from './core/registry.js';
export { loadConfig, parseConfigText, CONFIG_FILE_NAME } from './config.js';
export type { HsConfig, LoadConfigOptions } from './config.js';

// Transports
export type { Transport, ValueRequest, ValueResponse, Points } from './backends/transport.js';
export { HttpTransport } from './backends/http-transport.js';
export type { HttpTransportOptions } from './backends/http-transport.js';
export { ZarrTransport } from './backends/zarr.js';
export type { ZarrStore, CreateArrayOptions } from './backends/zarr.js';

// Version
export const VERSION = '0.1.0';
