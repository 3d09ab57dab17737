/**
 * Output Port
 *
 * Where commands and the environment display send their user-facing text.
 * `createClackOutput` serves interactive terminals, `consoleOutput` everything
 * else, and tests pass a capturing port.
 */

export interface OutputPort {
  /** Summary line, such as the resolved flow and its counts */
  info(message: string): void;

  /** Plain text printed as is: trees, JSON, file listings */
  message(message: string): void;

  /** Outcome of a command that completed */
  success(message: string): void;

  /** Reason a command failed */
  error(message: string): void;
}
