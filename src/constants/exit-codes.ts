/**
 * Exit code constants for CLI commands.
 *
 * Following Unix conventions:
 * - 0 indicates success
 * - 1 indicates an error (including a failed verification)
 */

export const EXIT_CODE = {
  /** Command completed successfully */
  SUCCESS: 0,

  /** Command encountered an error */
  ERROR: 1,
} as const;

/**
 * Type representing valid exit codes.
 * All command functions should return this type.
 */
export type ExitCode = (typeof EXIT_CODE)[keyof typeof EXIT_CODE];
