/*
 * global options
 */

/*
 * debug level; 0 to disable
 *
 * when enabled, the graph builder checks that every move strictly decreases
 * the termination measure
 */
export const debug: number = 0;

/*
 * default log level; overridden by $LOG_LEVEL
 */
export const log_level: string = 'info';

/*
 * largest starting pile the cli will solve
 */
export const max_n: number = 120;

/*
 * alphabet for labelling moves in the session
 */
export const move_keys: string = 'abcdefghijklmnopqrstuvwxyz';
