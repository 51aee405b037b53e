import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { getDaemonStatus, getFTLPID, getFTLPIDFile, isProcessRunning, NO_PID } from './pid.js';
import { logger } from '../logging/logger.js';

describe('daemon PID', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ftl-utils-pid-'));
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  describe('getFTLPIDFile', () => {
    const defaultPidFile = '/run/test-ftl.pid';

    it('should return the default path when the FTL config is missing', () => {
      const ftlConfFile = join(dir, 'missing.conf');
      expect(getFTLPIDFile({ ftlConfFile, defaultPidFile })).toBe(defaultPidFile);
    });

    it('should return the default path when the FTL config is empty', () => {
      const ftlConfFile = join(dir, 'empty.conf');
      writeFileSync(ftlConfFile, '');
      expect(getFTLPIDFile({ ftlConfFile, defaultPidFile })).toBe(defaultPidFile);
    });

    it('should return PIDFILE from the FTL config', () => {
      const ftlConfFile = join(dir, 'ftl.conf');
      writeFileSync(ftlConfFile, 'PRIVACYLEVEL=0\nPIDFILE=/tmp/x.pid\n');
      expect(getFTLPIDFile({ ftlConfFile, defaultPidFile })).toBe('/tmp/x.pid');
    });

    it('should use the first PIDFILE line', () => {
      const ftlConfFile = join(dir, 'ftl.conf');
      writeFileSync(ftlConfFile, 'PIDFILE=/tmp/first.pid\nPIDFILE=/tmp/second.pid\n');
      expect(getFTLPIDFile({ ftlConfFile, defaultPidFile })).toBe('/tmp/first.pid');
    });

    it('should keep everything after the first "="', () => {
      const ftlConfFile = join(dir, 'ftl.conf');
      writeFileSync(ftlConfFile, 'PIDFILE=/tmp/a=b.pid\r\n');
      expect(getFTLPIDFile({ ftlConfFile, defaultPidFile })).toBe('/tmp/a=b.pid');
    });

    it('should ignore commented and indented PIDFILE lines', () => {
      const ftlConfFile = join(dir, 'ftl.conf');
      writeFileSync(ftlConfFile, '#PIDFILE=/tmp/commented.pid\n  PIDFILE=/tmp/indented.pid\n');
      expect(getFTLPIDFile({ ftlConfFile, defaultPidFile })).toBe(defaultPidFile);
    });

    it('should return the default path when the FTL config cannot be read', () => {
      const plainFile = join(dir, 'plain');
      writeFileSync(plainFile, 'not a directory');
      const ftlConfFile = join(plainFile, 'ftl.conf');
      expect(getFTLPIDFile({ ftlConfFile, defaultPidFile })).toBe(defaultPidFile);
    });

    it('should return the default path when PIDFILE is empty', () => {
      const ftlConfFile = join(dir, 'ftl.conf');
      writeFileSync(ftlConfFile, 'PIDFILE=\n');
      expect(getFTLPIDFile({ ftlConfFile, defaultPidFile })).toBe(defaultPidFile);
    });
  });

  describe('getFTLPID', () => {
    const writePid = (content: string): string => {
      const pidFile = join(dir, 'ftl.pid');
      writeFileSync(pidFile, content);
      return pidFile;
    };

    it('should return the PID from the file', () => {
      expect(getFTLPID(writePid('1234'))).toBe(1234);
    });

    it('should accept a trailing newline', () => {
      expect(getFTLPID(writePid('1234\n'))).toBe(1234);
    });

    it('should reject content with non-digit characters', () => {
      expect(getFTLPID(writePid('12a4'))).toBe(NO_PID);
      expect(logger.warn).toHaveBeenCalledOnce();
    });

    it('should reject shell payloads', () => {
      expect(getFTLPID(writePid('1; rm -rf /'))).toBe(NO_PID);
      expect(getFTLPID(writePid('-1'))).toBe(NO_PID);
      expect(getFTLPID(writePid(' 1234'))).toBe(NO_PID);
    });

    it('should reject numbers beyond the safe integer range', () => {
      expect(getFTLPID(writePid('99999999999999999999'))).toBe(NO_PID);
    });

    it('should return -1 for a file holding only a newline', () => {
      expect(getFTLPID(writePid('\n'))).toBe(-1);
    });

    it('should return -1 for an empty file', () => {
      expect(getFTLPID(writePid(''))).toBe(-1);
    });

    it('should return -1 for a missing file', () => {
      expect(getFTLPID(join(dir, 'missing.pid'))).toBe(-1);
    });

    it('should return -1 when the PID file cannot be read', () => {
      const plainFile = join(dir, 'plain');
      writeFileSync(plainFile, 'not a directory');
      expect(getFTLPID(join(plainFile, 'ftl.pid'))).toBe(-1);
      expect(logger.warn).toHaveBeenCalledOnce();
    });

    it('should return -1 for a directory', () => {
      expect(getFTLPID(dir)).toBe(-1);
    });
  });

  describe('isProcessRunning', () => {
    it('should report the current process as running', () => {
      expect(isProcessRunning(process.pid)).toBe(true);
    });

    it('should never probe non-positive PIDs', () => {
      const kill = vi.spyOn(process, 'kill');
      expect(isProcessRunning(NO_PID)).toBe(false);
      expect(isProcessRunning(0)).toBe(false);
      expect(kill).not.toHaveBeenCalled();
    });

    it('should treat EPERM as running', () => {
      vi.spyOn(process, 'kill').mockImplementation(() => {
        throw Object.assign(new Error('kill EPERM'), { code: 'EPERM' });
      });
      expect(isProcessRunning(4242)).toBe(true);
    });

    it('should treat ESRCH as not running', () => {
      vi.spyOn(process, 'kill').mockImplementation(() => {
        throw Object.assign(new Error('kill ESRCH'), { code: 'ESRCH' });
      });
      expect(isProcessRunning(4242)).toBe(false);
    });
  });

  describe('getDaemonStatus', () => {
    it('should combine the resolved PID file, PID and probe', () => {
      const pidFile = join(dir, 'custom.pid');
      const ftlConfFile = join(dir, 'ftl.conf');
      writeFileSync(ftlConfFile, `PIDFILE=${pidFile}\n`);
      writeFileSync(pidFile, `${process.pid}\n`);

      expect(getDaemonStatus({ ftlConfFile })).toEqual({ pidFile, pid: process.pid, running: true });
    });

    it('should report no PID when the PID file is missing', () => {
      const defaultPidFile = join(dir, 'missing.pid');
      expect(getDaemonStatus({ ftlConfFile: join(dir, 'missing.conf'), defaultPidFile })).toEqual({
        pidFile: defaultPidFile,
        pid: NO_PID,
        running: false,
      });
    });
  });
});
