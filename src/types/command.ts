/**
 * A structured command ready for execution.
 * Components never build raw command strings, except for hooks, which are
 * user-authored shell lines and run with `shell: true`.
 */
export interface Command {
  readonly argv: string[];
  readonly env?: Record<string, string>;
  /** Run argv[0] through the platform shell (argv must then hold a single string). */
  readonly shell?: boolean;
}
