import { getFTLPID, getFTLPIDFile } from '../daemon/index.js';
import { prepareCommand } from './context.js';
import type { CommonOptions } from './context.js';

export async function pidFileCommand(options: CommonOptions): Promise<void> {
  const config = await prepareCommand(options);
  console.log(getFTLPIDFile(config));
}

export async function pidCommand(pidFile: string | undefined, options: CommonOptions): Promise<void> {
  const config = await prepareCommand(options);
  console.log(getFTLPID(pidFile ?? getFTLPIDFile(config)));
}
