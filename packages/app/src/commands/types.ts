/**
 * Command types and interfaces
 */

/**
 * Command execution result
 */
export interface CommandResult<T> {
  success: boolean;
  output: T;
  duration?: number;
}
