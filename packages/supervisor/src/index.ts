/**
 * @meshbridge/supervisor: reconnecting owner of a radio link.
 */

export {
  ReconnectSupervisor,
  DEFAULT_MIN_BACKOFF_MS,
  DEFAULT_MAX_BACKOFF_MS,
  DEFAULT_STALE_AFTER_MS,
  DEFAULT_PROBE_INTERVAL_MS,
  DEFAULT_QUEUE_CAPACITY,
} from './reconnect-supervisor.js';
export type { ReconnectSupervisorOpts, SupervisorStats } from './reconnect-supervisor.js';

export { SendQueue } from './send-queue.js';
