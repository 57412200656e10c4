/**
 * Namespaced debug logging.
 *
 * Every module logs under `mdpipe:<scope>`; output is enabled with
 * `DEBUG=mdpipe:*`.
 *
 * @module core/logger
 */
import debug from 'debug';

export type Logger = debug.Debugger;

const ROOT_NAMESPACE = 'mdpipe';

/**
 * Create a logger for the given scope, e.g. `createLogger('blocks')`.
 */
export function createLogger(scope: string): Logger {
  return debug(`${ROOT_NAMESPACE}:${scope}`);
}
