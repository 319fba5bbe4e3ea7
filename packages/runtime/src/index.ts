/**
 * @bgctl/runtime
 * Transports to the outside world: local processes and HTTP probes
 */

export { LocalExec, getLocalExec, type CommandRunner, type ExecResult, type ExecOptions } from './local-exec.js';
export {
  ProbeClient,
  isSuccessStatus,
  normalizeHeaders,
  poolUrl,
  type ProbeClientOptions,
  type ProbeMethod,
  type ProbeRequest,
  type ProbeResponse,
} from './probe-client.js';
