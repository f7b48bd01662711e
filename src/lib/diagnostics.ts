/**
 * Truncation diagnostics for callers that want to hear about dropped data.
 *
 * The engine truncates silently; this layer compares lengths up front and
 * reports through a warning sink (`console.warn` unless one is injected).
 */

import { pad } from './pad.js';
import { codePointLength } from './text.js';
import type { PadRequest } from '../types/pad.js';

export type WarnFn = (message: string) => void;

export interface DiagnosticsOptions {
  /** Where warnings go; defaults to console.warn */
  warn?: WarnFn;
  /** Set false to pad silently */
  enabled?: boolean;
}

export interface PadOutcome {
  text: string;
  truncated: boolean;
  /** Code points dropped by slice-to-fit */
  dropped: number;
}

const PREVIEW_CHARS = 32;

function preview(text: string): string {
  return text.length > PREVIEW_CHARS ? `${text.slice(0, PREVIEW_CHARS)}...` : text;
}

/**
 * Pads text and warns when the source had to be truncated to fit.
 */
export function padWithDiagnostics(
  text: string,
  request: PadRequest,
  options: DiagnosticsOptions = {}
): PadOutcome {
  const { warn = console.warn, enabled = true } = options;
  const length = codePointLength(text);
  const output = pad(text, request.width, request.alignment, request.symbol);

  if (length <= request.width) {
    return { text: output, truncated: false, dropped: 0 };
  }

  const dropped = length - request.width;
  if (enabled) {
    warn(
      `could not pad \`${preview(text)}\` to width ${request.width} (length ${length}); ` +
        `sliced to fit with ${request.alignment} alignment, ${dropped} character(s) dropped`
    );
  }
  return { text: output, truncated: true, dropped };
}
