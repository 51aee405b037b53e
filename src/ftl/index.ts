export { spawnAsync, createCliBackend, getFTLConfigValue, setFTLConfigValue } from './client.js';
export type { CliBackendOptions } from './client.js';
export { FtlClientError } from './types.js';
export type { CommandResult, CommandRunner, ConfigBackend, SetConfigResult } from './types.js';
