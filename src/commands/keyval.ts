import { addKey, addOrEditKeyValPair, removeKey } from '../keyval/index.js';
import { logger } from '../logging/logger.js';
import { describeError, fail, prepareCommand } from './context.js';
import type { CommonOptions } from './context.js';

export async function setCommand(file: string, key: string, value: string, options: CommonOptions): Promise<void> {
  await prepareCommand(options);

  try {
    const result = addOrEditKeyValPair(file, key, value);
    logger.debug(`${result === 'added' ? 'Added' : 'Updated'} ${key} in ${file}`);
  } catch (err) {
    fail(`Failed to set ${key} in ${file}`, describeError(err));
  }
}

export async function addKeyCommand(file: string, key: string, options: CommonOptions): Promise<void> {
  const config = await prepareCommand(options);

  try {
    const added = addKey(file, key, { match: config.keyMatch });
    logger.debug(added ? `Added ${key} to ${file}` : `${key} already present in ${file}`);
  } catch (err) {
    fail(`Failed to add ${key} to ${file}`, describeError(err));
  }
}

export async function removeKeyCommand(file: string, key: string, options: CommonOptions): Promise<void> {
  const config = await prepareCommand(options);

  try {
    const removed = removeKey(file, key, { match: config.keyMatch });
    logger.debug(`Removed ${removed} line(s) matching ${key} from ${file}`);
  } catch (err) {
    fail(`Failed to remove ${key} from ${file}`, describeError(err));
  }
}
