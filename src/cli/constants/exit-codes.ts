/**
 * @packageDocumentation
 * Process exit codes chosen by the entrypoints.
 *
 * @remarks Failures use -1, which POSIX shells observe as 255.
 */

/** Normal completion, help and version output. */
export const EXIT_SUCCESS = 0;

/** Option errors, engine construction failures and uncaught script failures. */
export const EXIT_FAILURE = -1;
