export { getFTLPIDFile, getFTLPID, isProcessRunning, getDaemonStatus, NO_PID } from './pid.js';
export type { DaemonStatus, PidFileOptions } from './pid.js';
