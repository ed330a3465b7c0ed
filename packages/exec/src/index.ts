/**
 * @wp-promote/exec
 * Local command execution and the file-transfer/archive tools built on it.
 */

export { LocalExec, getLocalExec, runChecked } from './local-exec.js';
export { Rsync, buildRsyncArgs } from './rsync.js';
export { Tar } from './tar.js';
export { PathToolProbe } from './probe.js';
