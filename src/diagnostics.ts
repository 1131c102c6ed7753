/**
 * Structured notes about graceful degradations during generation (an edge to
 * an unknown node, an unknown colour name, ...). They never change the
 * document; the CLI and tool layers report them.
 */

export type DiagnosticCode =
  | "UNKNOWN_LAYOUT"
  | "UNKNOWN_THEME"
  | "DARK_THEME_UNAVAILABLE"
  | "EDGE_UNKNOWN_NODE"
  | "GROUP_UNKNOWN_MEMBER"
  | "GROUP_EMPTY"
  | "PIPELINE_UNKNOWN_NODE"
  | "UNPLACED_NODE"
  | "UNKNOWN_NODE_TYPE"
  | "UNKNOWN_EDGE_STYLE"
  | "UNKNOWN_EDGE_COLOR";

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  /** The id or value the note is about. */
  ref?: string;
}

export function diagnostic(code: DiagnosticCode, message: string, ref?: string): Diagnostic {
  return ref === undefined ? { code, message } : { code, message, ref };
}
