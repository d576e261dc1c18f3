/**
 * Version information.
 *
 * @module
 */

/**
 * The current version of nameless-lambda.
 */
export const VERSION = "0.1.0";
