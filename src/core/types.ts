/**
 * Core type definitions shared by every stage of the pipeline.
 *
 * The pipeline runs preprocess -> block parse -> tree build (inline scan)
 * -> postprocess -> serialize. Each stage hands the next one one of the
 * structures below.
 */

// ---------------------------------------------------------------------------
// Token tree
// ---------------------------------------------------------------------------

/** Literal text. Escaped by the serializer. */
export interface TextNode {
  type: 'text';
  value: string;
}

/** A markup element owning an ordered list of children. */
export interface ElementNode {
  type: 'element';
  tag: string;
  /** Attribute values, serialized in insertion order. */
  attrs: Record<string, string>;
  children: TokenNode[];
}

/**
 * Markup that was already constructed (raw HTML from the source, output of
 * a custom fence formatter). Never escaped by the serializer.
 */
export interface RawNode {
  type: 'raw';
  value: string;
}

export type TokenNode = TextNode | ElementNode | RawNode;

/** One table-of-contents entry collected from a heading. */
export interface TocEntry {
  level: number;
  id: string;
  text: string;
}

/** Side-channel data gathered while converting one document. */
export interface DocumentMetadata {
  toc: TocEntry[];
  /** Content-level anomalies that were degraded instead of failing. */
  warnings: string[];
  /** Free-form values contributed by plugins, keyed by plugin name. */
  data: Record<string, unknown>;
}

/** Root of a converted document. Created fresh for every conversion. */
export interface Document {
  type: 'document';
  children: TokenNode[];
  metadata: DocumentMetadata;
}

// ---------------------------------------------------------------------------
// Block structure
// ---------------------------------------------------------------------------

/** Markdown prose handed to the base lexer as-is. */
export interface TextBlock {
  kind: 'text';
  lines: string[];
}

/** Fields shared by every block opened by a {@link BlockSyntax}. */
interface OpenedBlock {
  /** Name of the syntax that opened the block. */
  syntax: string;
  /** Type tag, e.g. the fence language or the directive name. */
  type: string;
  /** Text following the type tag on the open line. */
  info: string;
  /** The open marker itself, e.g. "```" or ":::". */
  marker: string;
  indent: number;
  /** False when the block was closed implicitly at end of input. */
  closed: boolean;
}

/** A block whose content is parsed again as blocks. */
export interface ContainerBlock extends OpenedBlock {
  kind: 'container';
  /** Header lines found between `---` fences right after the open line. */
  header: string[];
  /** Body lines, dedented by the block's indent. */
  lines: string[];
  children: Block[];
}

/** A block whose content is kept verbatim. */
export interface RawBlock extends OpenedBlock {
  kind: 'raw';
  content: string;
}

export type Block = TextBlock | ContainerBlock | RawBlock;

/** Output of the block parser. */
export interface ParsedDocument {
  blocks: Block[];
}

/** A recognised open-marker line. */
export interface BlockOpen {
  type: string;
  info: string;
  marker: string;
  indent: number;
}

/**
 * A line-oriented block syntax (fences, directives, ...).
 *
 * The parser strips and compares indentation itself; a close marker only
 * closes a block opened at the same indent.
 */
export interface BlockSyntax {
  kind: 'block';
  name: string;
  /** `raw` keeps the body verbatim, `blocks` parses it for nested blocks. */
  content: 'raw' | 'blocks';
  /** Whether a `---` delimited header may follow the open line. */
  header?: boolean;
  /** Recognise an open-marker line (already stripped of its indent). */
  matchOpen(line: string): Omit<BlockOpen, 'indent'> | null;
  /** Whether `line` (stripped of its indent) closes a block opened by `open`. */
  isClose(line: string, open: BlockOpen): boolean;
}

// ---------------------------------------------------------------------------
// Inline rules
// ---------------------------------------------------------------------------

/** A recognised inline span. `groups[0]` is the whole match. */
export interface InlineMatch {
  start: number;
  end: number;
  groups: string[];
}

/** What a rule handler can do while building its nodes. */
export interface InlineContext {
  /** Current nesting depth; 0 for top-level text. */
  readonly depth: number;
  /**
   * Scan text nested inside the node being built. Rules the current rule
   * conflicts with are disabled for the nested scan.
   */
  scanNested(text: string): TokenNode[];
  warn(message: string): void;
}

/** Nodes produced by a handler; `end` defaults to the match end. */
export interface InlineResult {
  nodes: TokenNode[];
  end?: number;
}

export interface InlineRule {
  kind: 'inline';
  name: string;
  /** Find the first match starting at or after `from`. */
  find(text: string, from: number): InlineMatch | null;
  /** Build nodes for a match, or return `null` to decline it. */
  handle(match: InlineMatch, context: InlineContext): InlineResult | null;
  /** Names of rules disabled inside spans this rule consumes. */
  conflicts?: readonly string[];
  /** The rule emits links, so it is skipped inside link text. */
  createsLinks?: boolean;
}

// ---------------------------------------------------------------------------
// Postprocessing
// ---------------------------------------------------------------------------

export interface PassContext {
  warn(message: string): void;
}

/** A tree rewrite run after the document has been built. */
export interface PostprocessorPass {
  kind: 'postprocessor';
  name: string;
  /** Rewrite the document in place. Must be idempotent. */
  run(document: Document, context: PassContext): void;
}

/** A text rewrite run before block parsing. */
export interface Preprocessor {
  kind: 'preprocessor';
  name: string;
  run(text: string, context: PassContext): string;
}
