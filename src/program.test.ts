import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createProgram } from './program.js';
import { setCommand, setConfigCommand } from './commands/index.js';

vi.mock('./commands/index.js', () => ({
  setCommand: vi.fn(),
  addKeyCommand: vi.fn(),
  removeKeyCommand: vi.fn(),
  pidFileCommand: vi.fn(),
  pidCommand: vi.fn(),
  getConfigCommand: vi.fn(),
  setConfigCommand: vi.fn(),
  statusCommand: vi.fn(),
  initCommand: vi.fn(),
}));

const run = (...args: string[]) => createProgram().parseAsync(['node', 'ftl-utils', ...args]);

describe('createProgram', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should pass a negative value to set-config', async () => {
    await run('set-config', 'misc.nice', '-10');
    expect(setConfigCommand).toHaveBeenCalledWith('misc.nice', '-10', {}, expect.anything());
  });

  it('should still read options given before the arguments', async () => {
    await run('set-config', '-v', 'misc.nice', '-10');
    expect(setConfigCommand).toHaveBeenCalledWith('misc.nice', '-10', { verbose: true }, expect.anything());
  });

  it('should pass a value starting with "-" to set', async () => {
    await run('set', '/etc/pihole/setupVars.conf', 'OFFSET', '-1');
    expect(setCommand).toHaveBeenCalledWith('/etc/pihole/setupVars.conf', 'OFFSET', '-1', {}, expect.anything());
  });
});
