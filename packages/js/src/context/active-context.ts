import { Direction } from '../keywords.js';
import { JsonValue, compareShortestLeast, deepEqual } from '../value.js';
import type { InverseContext } from './inverse.js';

/**
 * Resolved meaning of one term.
 *
 * Optional mappings distinguish "not set" (`undefined`) from an explicit
 * `null`, which the algorithms treat differently.
 */
export interface TermDefinition {
  /** Expanded IRI, keyword or blank node identifier; `null` decouples the term */
  readonly iri: string | null;
  readonly prefix: boolean;
  readonly protected: boolean;
  readonly reverse: boolean;
  /** Base URL the scoped context is resolved against */
  readonly baseUrl?: string | null;
  /** Property- or type-scoped local context */
  readonly context?: JsonValue;
  /** Sorted container keywords; empty when the term has no container mapping */
  readonly container: readonly string[];
  readonly direction?: Direction | null;
  readonly index?: string;
  readonly language?: string | null;
  readonly nest?: string;
  readonly type?: string;
}

export function hasContainer(definition: TermDefinition | undefined, container: string): boolean {
  return definition !== undefined && definition.container.includes(container);
}

/** Equality ignoring the protected flag and where the definition came from. */
export function sameDefinition(a: TermDefinition, b: TermDefinition): boolean {
  return (
    a.iri === b.iri &&
    a.prefix === b.prefix &&
    a.reverse === b.reverse &&
    a.type === b.type &&
    a.language === b.language &&
    a.direction === b.direction &&
    a.index === b.index &&
    a.nest === b.nest &&
    a.container.length === b.container.length &&
    a.container.every((c, i) => c === b.container[i]) &&
    deepEqual(a.context, b.context)
  );
}

function anyProtected(terms: ReadonlyMap<string, TermDefinition>): boolean {
  for (const definition of terms.values()) {
    if (definition.protected) return true;
  }
  return false;
}

/** Read access shared by frozen snapshots and drafts under construction. */
export interface ContextReader {
  readonly originalBaseUrl: string | null;
  readonly baseIri: string | null;
  readonly vocab: string | null;
  readonly defaultLanguage: string | null;
  readonly defaultDirection: Direction | null;
  getTerm(term: string): TermDefinition | undefined;
  hasTerm(term: string): boolean;
}

export interface ContextState {
  originalBaseUrl: string | null;
  baseIri: string | null;
  vocab: string | null;
  defaultLanguage: string | null;
  defaultDirection: Direction | null;
  previousContext: ActiveContext | null;
  terms: ReadonlyMap<string, TermDefinition>;
}

/**
 * Immutable snapshot of the context in effect at one point of a document.
 *
 * Snapshots are never modified once built; `edit()` hands out a draft that
 * copies the term table and shares every frozen definition with this one.
 */
export class ActiveContext implements ContextReader {
  readonly originalBaseUrl: string | null;
  readonly baseIri: string | null;
  readonly vocab: string | null;
  readonly defaultLanguage: string | null;
  readonly defaultDirection: Direction | null;
  /** Rollback target for contexts that do not propagate */
  readonly previousContext: ActiveContext | null;

  private readonly termTable: ReadonlyMap<string, TermDefinition>;
  private inverseCache: InverseContext | undefined;

  private constructor(state: ContextState) {
    this.originalBaseUrl = state.originalBaseUrl;
    this.baseIri = state.baseIri;
    this.vocab = state.vocab;
    this.defaultLanguage = state.defaultLanguage;
    this.defaultDirection = state.defaultDirection;
    this.previousContext = state.previousContext;
    this.termTable = state.terms;
  }

  /** An empty context rooted at `base`. */
  static initial(base: string | null = null): ActiveContext {
    return new ActiveContext({
      originalBaseUrl: base,
      baseIri: base,
      vocab: null,
      defaultLanguage: null,
      defaultDirection: null,
      previousContext: null,
      terms: new Map(),
    });
  }

  /** @internal used by {@link ContextDraft.freeze} */
  static fromState(state: ContextState): ActiveContext {
    return new ActiveContext(state);
  }

  getTerm(term: string): TermDefinition | undefined {
    return this.termTable.get(term);
  }

  hasTerm(term: string): boolean {
    return this.termTable.has(term);
  }

  get termCount(): number {
    return this.termTable.size;
  }

  terms(): IterableIterator<[string, TermDefinition]> {
    return this.termTable.entries();
  }

  /** Term names, shortest first then code-point order. */
  sortedTerms(): string[] {
    return [...this.termTable.keys()].sort(compareShortestLeast);
  }

  hasProtectedTerms(): boolean {
    return anyProtected(this.termTable);
  }

  edit(): ContextDraft {
    return new ContextDraft({
      originalBaseUrl: this.originalBaseUrl,
      baseIri: this.baseIri,
      vocab: this.vocab,
      defaultLanguage: this.defaultLanguage,
      defaultDirection: this.defaultDirection,
      previousContext: this.previousContext,
      terms: this.termTable,
    });
  }

  /** Memoised inverse context; built on first use by `build`. */
  inverse(build: (context: ActiveContext) => InverseContext): InverseContext {
    if (this.inverseCache === undefined) {
      this.inverseCache = build(this);
    }
    return this.inverseCache;
  }
}

/**
 * Mutable working copy used while a local context is processed. The term
 * table is copied on the first write, so untouched definitions stay shared
 * with the snapshot the draft came from.
 */
export class ContextDraft implements ContextReader {
  originalBaseUrl: string | null;
  baseIri: string | null;
  vocab: string | null;
  defaultLanguage: string | null;
  defaultDirection: Direction | null;
  previousContext: ActiveContext | null;

  private sharedTerms: ReadonlyMap<string, TermDefinition>;
  private ownTerms: Map<string, TermDefinition> | null = null;

  constructor(state: ContextState) {
    this.originalBaseUrl = state.originalBaseUrl;
    this.baseIri = state.baseIri;
    this.vocab = state.vocab;
    this.defaultLanguage = state.defaultLanguage;
    this.defaultDirection = state.defaultDirection;
    this.previousContext = state.previousContext;
    this.sharedTerms = state.terms;
  }

  getTerm(term: string): TermDefinition | undefined {
    return (this.ownTerms ?? this.sharedTerms).get(term);
  }

  hasTerm(term: string): boolean {
    return (this.ownTerms ?? this.sharedTerms).has(term);
  }

  setTerm(term: string, definition: TermDefinition): void {
    this.writableTerms().set(
      term,
      Object.freeze({ ...definition, container: Object.freeze([...definition.container]) }),
    );
  }

  hasProtectedTerms(): boolean {
    return anyProtected(this.ownTerms ?? this.sharedTerms);
  }

  removeTerm(term: string): void {
    if (this.hasTerm(term)) this.writableTerms().delete(term);
  }

  /** Snapshot of the current state; later writes copy the table again. */
  freeze(): ActiveContext {
    if (this.ownTerms !== null) {
      this.sharedTerms = this.ownTerms;
      this.ownTerms = null;
    }
    return ActiveContext.fromState({
      originalBaseUrl: this.originalBaseUrl,
      baseIri: this.baseIri,
      vocab: this.vocab,
      defaultLanguage: this.defaultLanguage,
      defaultDirection: this.defaultDirection,
      previousContext: this.previousContext,
      terms: this.sharedTerms,
    });
  }

  private writableTerms(): Map<string, TermDefinition> {
    if (this.ownTerms === null) {
      this.ownTerms = new Map(this.sharedTerms);
    }
    return this.ownTerms;
  }
}
