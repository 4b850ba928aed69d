// packages/core/src/utils/constants.ts — Shared defaults

/** Reserved entry node name */
export const START = 'START';

/** Reserved terminal node name */
export const END = 'END';

/** Default whole-run time limit in seconds */
export const DEFAULT_TIMEOUT_SEC = 120;

/** Longest whole-run time limit in seconds; Node timers hold at most 2^31-1 ms */
export const MAX_TIMEOUT_SEC = 2_147_483;

/** Default number of correction retries after a malformed structured output */
export const DEFAULT_MAX_RETRIES = 2;

/** Default cap on model/tool round trips per node */
export const DEFAULT_MAX_TOOL_ITERATIONS = 10;

/** Maximum edit distance for "did you mean" suggestions */
export const SUGGESTION_MAX_DISTANCE = 2;

/** Supported document schema version */
export const SCHEMA_VERSION = '1.0';

/** Prefix of the hidden per-loop iteration counters */
export const LOOP_COUNTER_PREFIX = '_loop_iteration_';

/** Default timeout for one command-backed model call in seconds */
export const DEFAULT_MODEL_TIMEOUT_SEC = 300;
