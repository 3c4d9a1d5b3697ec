/**
 * seplist - Core Types
 * Contracts shared by the plain and the separated child-builder delegates
 */

// =============================================================================
// Build Context
// =============================================================================

/** Render context handed to every builder call */
export interface BuildContext {
  /** Document used to create elements for string templates */
  readonly document: Document;
  /** CSS class prefix for the classes the delegates add (default: 'seplist') */
  readonly classPrefix: string;
}

// =============================================================================
// Builders
// =============================================================================

/**
 * What a builder returns.
 * - `string` — HTML markup, wrapped in a `div`
 * - `HTMLElement` — used as-is
 */
export type TemplateResult = string | HTMLElement;

/** Builds the element at a logical index. Must return an element for every index in range. */
export type IndexedElementBuilder = (
  context: BuildContext,
  index: number,
) => TemplateResult;

/**
 * Builds the child at an index, or returns `null` when no child exists there.
 * Used by the plain delegate, which may have no fixed child count.
 */
export type ChildBuilder = (
  context: BuildContext,
  index: number,
) => TemplateResult | null;

/**
 * Locates the current index of a child from its key (the element's
 * `data-key`), so a host can reattach state after the build order changed.
 * Returns `null` or `undefined` when the key is gone.
 */
export type ChildIndexGetter = (key: string) => number | null | undefined;

/** Maps a child to its accessibility index, or `null` to leave it out */
export type SemanticIndexCallback = (
  element: HTMLElement,
  index: number,
) => number | null;

// =============================================================================
// Delegate Options
// =============================================================================

/** Options forwarded unchanged from a separated delegate to its plain delegate */
export interface DelegateOptions {
  /** Mark children so a recycling host keeps their state (default: true) */
  addAutomaticKeepAlives?: boolean;
  /** Isolate each child's repaint via the boundary class (default: true) */
  addRepaintBoundaries?: boolean;
  /** Expose aria-posinset / aria-setsize on children (default: true) */
  addSemanticIndexes?: boolean;
  /**
   * Called by the host to relocate a child's state when build order changes.
   * Works in child (combined) indices; the delegate does not remap it.
   */
  findChildIndexCallback?: ChildIndexGetter;
}

/** Configuration for createChildBuilderDelegate */
export interface ChildBuilderDelegateConfig extends DelegateOptions {
  /** Number of children, or `null` for an unbounded list (default: null) */
  childCount?: number | null;
  /** Maps a child to its semantic index (default: the child index) */
  semanticIndexCallback?: SemanticIndexCallback;
  /** Added to every semantic index (default: 0) */
  semanticIndexOffset?: number;
  /** Value of aria-setsize (default: childCount) */
  semanticChildCount?: number | null;
}

/** Options after defaults are applied */
export interface ResolvedDelegateOptions {
  readonly addAutomaticKeepAlives: boolean;
  readonly addRepaintBoundaries: boolean;
  readonly addSemanticIndexes: boolean;
  readonly findChildIndexCallback: ChildIndexGetter | null;
  readonly semanticIndexCallback: SemanticIndexCallback;
  readonly semanticIndexOffset: number;
  readonly semanticChildCount: number | null;
}

// =============================================================================
// Delegates
// =============================================================================

/** What a host list pipeline asks of a delegate during layout */
export interface ChildBuilderDelegate {
  /** Total child count, or `null` when unbounded */
  readonly childCount: number | null;

  /** Same as childCount; the host uses it to size the scrollable extent */
  readonly estimatedChildCount: number | null;

  /** Resolved options, as forwarded by the caller */
  readonly options: ResolvedDelegateOptions;

  /** Build the child at `index`, or `null` if none exists */
  build(context: BuildContext, index: number): HTMLElement | null;

  /** Current index of the child with `key`, or `null` if unknown */
  findIndexByKey(key: string): number | null;
}

/** Configuration for createSeparatedDelegate */
export interface SeparatedDelegateConfig extends DelegateOptions {
  /** Builds item `index`, for index in [0, itemCount) */
  itemBuilder: IndexedElementBuilder;
  /** Number of items, separators not counted */
  itemCount: number;
  /** Builds separator `index`, for index in [0, itemCount - 1) */
  separatorBuilder: IndexedElementBuilder;
}

/** Plain delegate over items with separators interleaved between them */
export interface SeparatedChildBuilderDelegate extends ChildBuilderDelegate {
  /** Number of items, separators not counted */
  readonly itemCount: number;
  readonly childCount: number;
  readonly estimatedChildCount: number;
}
