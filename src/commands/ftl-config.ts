import { createCliBackend, getFTLConfigValue, setFTLConfigValue, FtlClientError } from '../ftl/index.js';
import { describeError, fail, prepareCommand } from './context.js';
import type { CommonOptions } from './context.js';

export async function getConfigCommand(key: string, options: CommonOptions): Promise<void> {
  const config = await prepareCommand(options);
  const backend = createCliBackend({ binary: config.ftlBinary });

  try {
    console.log(await getFTLConfigValue(key, backend));
  } catch (err) {
    if (err instanceof FtlClientError) {
      fail(`Failed to read ${key}`, err.stderr.trim() || `exit code ${err.exitCode}`);
    }
    fail(`Failed to read ${key}`, describeError(err));
  }
}

export async function setConfigCommand(key: string, value: string, options: CommonOptions): Promise<void> {
  const config = await prepareCommand(options);
  const backend = createCliBackend({ binary: config.ftlBinary });

  const result = await setFTLConfigValue(key, value, backend);
  if (!result.ok) {
    fail(`Failed to set ${key}`, result.error);
  }
}
