/**
 * Core types for the padding engine.
 *
 * Alignment and symbol tags are string enums whose values equal their member
 * names, so a structured-data layer can store them as plain strings
 * (`"Right"`, `"Whitespace"`).
 */

/**
 * Which side(s) of a source receive fill, or which window is kept when the
 * source is longer than the target width.
 */
export enum Alignment {
  Left = 'Left',
  Right = 'Right',
  Center = 'Center',
}

/**
 * Closed catalog of single-element fill symbols.
 */
export enum PadSymbol {
  Whitespace = 'Whitespace',
  Zero = 'Zero',
  One = 'One',
  Two = 'Two',
  Three = 'Three',
  Four = 'Four',
  Five = 'Five',
  Six = 'Six',
  Seven = 'Seven',
  Eight = 'Eight',
  Nine = 'Nine',
  Hyphen = 'Hyphen',
  Underscore = 'Underscore',
  Period = 'Period',
  Comma = 'Comma',
  Colon = 'Colon',
  Semicolon = 'Semicolon',
  Exclamation = 'Exclamation',
  Question = 'Question',
  Asterisk = 'Asterisk',
  Plus = 'Plus',
  Equals = 'Equals',
  Hash = 'Hash',
  Slash = 'Slash',
  Backslash = 'Backslash',
  Pipe = 'Pipe',
  Tilde = 'Tilde',
}

/**
 * Leading and trailing fill counts produced by the alignment policy.
 */
export interface PaddingSplit {
  leading: number;
  trailing: number;
}

/**
 * Half-open `[start, end)` window kept when truncating.
 */
export interface TruncationWindow {
  start: number;
  end: number;
}

/**
 * Capability: element type `E` can be produced from any pad symbol.
 */
export interface SymbolCodec<E> {
  fromSymbol(symbol: PadSymbol): E;
}

/**
 * A source that can be padded or truncated to a width.
 *
 * `Out` is the freshly allocated result type, `Buf` the caller-owned buffer
 * the result can be appended to.
 */
export interface Paddable<Out, Buf> {
  /** Element count of the source */
  readonly length: number;
  pad(width: number, alignment: Alignment, symbol: PadSymbol): Out;
  sliceToFit(width: number, alignment: Alignment): Out;
  padAndPushToBuffer(width: number, alignment: Alignment, symbol: PadSymbol, buffer: Buf): void;
}

/**
 * A fully resolved pad request, as decoded from structured data or CLI flags.
 */
export interface PadRequest {
  width: number;
  alignment: Alignment;
  symbol: PadSymbol;
}
