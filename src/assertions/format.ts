import type { ReportSession } from "../report/session.js";
import type { BlockType } from "../types/report.js";

export interface WrapBlockOptions {
  /** Nest the body inside the output container selector */
  selector?: boolean;
  description?: string;
}

export function resolveMarker(session: ReportSession, type: BlockType): string {
  return session.config.markers[type];
}

/**
 * Start line for a block. The assert marker always takes the
 * "MARKER: description" form; other markers only with a description.
 */
export function startMarker(
  session: ReportSession,
  marker: string,
  description?: string
): string {
  if (description !== undefined) {
    return `${marker}: ${description}`;
  }
  if (marker === session.config.markers.assert) {
    return `${marker}: ${session.currentLabel("test") ?? ""}`.trimEnd();
  }
  return marker;
}

/**
 * Write `body` between start and end marker comments
 */
export function wrapBlock(
  session: ReportSession,
  type: BlockType,
  body: () => void,
  options: WrapBlockOptions = {}
): void {
  const { selector = true, description } = options;
  session.outputContext(type);
  const marker = resolveMarker(session, type);

  session.message(startMarker(session, marker, description), "comment");
  if (selector) {
    const container = session.config.output.selector;
    const lines = session.capture(body);
    session.emit(lines.length > 0 ? `${container} { ${lines.join(" ")} }` : `${container} {}`);
  } else {
    body();
  }
  session.message(`END_${marker}`, "comment");
}

/**
 * Write a literal string between start and end marker comments. Used for
 * "output contains this text" checks; never wrapped in a container.
 */
export function wrapString(
  session: ReportSession,
  type: BlockType,
  needle: string,
  description?: string
): void {
  session.outputContext(type);
  const marker = resolveMarker(session, type);

  session.message(
    [startMarker(session, marker, description), needle, `END_${marker}`],
    "comment"
  );
}
