/**
 * Core type definitions for ldsync
 */

// ── Terms & Triples ───────────────────────────────────────────────

/** A reference to another resource */
export interface ReferenceTerm {
  type: 'uri';
  value: string;
}

/** A literal value; plain xsd:string literals carry no datatype */
export interface LiteralTerm {
  type: 'literal';
  value: string;
  datatype?: string;
  lang?: string;
}

export type Term = ReferenceTerm | LiteralTerm;

export interface Triple {
  subject: string;
  predicate: string;
  object: Term;
}

/** Converts between cell text and the term a property requires */
export interface TermCodec {
  /** Short description of the term shape, used in error messages */
  readonly description: string;
  toTerm(value: string): Term;
  stringify(term: Term): string;
}

// ── Models ────────────────────────────────────────────────────────

export type TermKind = 'literal' | 'reference';

/** Declarative input for a property */
export interface PropertyDefinitionInput {
  predicate: string;
  kind?: TermKind;
  datatype?: string;
  lang?: string;
}

/** A property definition resolved into its codec */
export interface PropertyDefinition {
  name: string;
  predicate: string;
  codec: TermCodec;
}

export interface EmbeddedDefinitionInput {
  predicate: string;
  properties: Record<string, PropertyDefinitionInput>;
}

export interface EmbeddedDefinition {
  name: string;
  predicate: string;
  properties: Map<string, PropertyDefinition>;
}

/**
 * Attribute path from a header map. `inner` is set for embedded
 * properties (`part.label` → outer `part`, inner `label`).
 */
export interface AttributePath {
  outer: string;
  inner?: string;
}

export interface ModelDefinitionInput {
  name: string;
  types?: string[];
  properties?: Record<string, PropertyDefinitionInput>;
  embedded?: Record<string, EmbeddedDefinitionInput>;
  /** Header name → dotted attribute path */
  headerMap: Record<string, string>;
}

export interface ModelDescriptor {
  name: string;
  types: string[];
  properties: Map<string, PropertyDefinition>;
  embedded: Map<string, EmbeddedDefinition>;
  headerMap: Map<string, AttributePath>;
}

// ── Rows ──────────────────────────────────────────────────────────

/** One data row of the input file, keyed by header */
export interface TableRow {
  /** 1-based line number of the row's first line in the file */
  line: number;
  values: Record<string, string>;
}

export interface Table {
  headers: string[];
  rows: TableRow[];
}

// ── Import ────────────────────────────────────────────────────────

export type RowState = 'read' | 'fetched' | 'indexed' | 'diffed' | 'unchanged' | 'updated' | 'failed';

export interface RowFailure {
  line: number;
  uri: string;
  code: string;
  message: string;
}

export interface RowOutcome {
  line: number;
  uri: string;
  state: 'unchanged' | 'updated' | 'failed';
  deletions: number;
  insertions: number;
  error?: RowFailure;
}

/** Aggregate counts for one import run */
export interface ImportReport {
  rows: number;
  updated: number;
  unchanged: number;
  failed: number;
  failures: RowFailure[];
}
