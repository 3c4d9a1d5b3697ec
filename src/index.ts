/**
 * seplist - Separated list delegate
 * Interleaves separator elements between list items for virtual list hosts,
 * remapping indices only
 *
 * @packageDocumentation
 */

export {
  createSeparatedDelegate,
  createChildBuilderDelegate,
  computeActualChildCount,
  separatedSemanticIndex,
  resolveDelegateOptions,
  toElement,
} from "./delegate";

export { createBuildContext, type BuildContextOptions } from "./context";

export {
  DEFAULT_CLASS_PREFIX,
  DEFAULT_ADD_AUTOMATIC_KEEP_ALIVES,
  DEFAULT_ADD_REPAINT_BOUNDARIES,
  DEFAULT_ADD_SEMANTIC_INDEXES,
  DEFAULT_SEMANTIC_INDEX_OFFSET,
} from "./constants";

export type {
  BuildContext,
  TemplateResult,
  IndexedElementBuilder,
  ChildBuilder,
  ChildIndexGetter,
  SemanticIndexCallback,
  DelegateOptions,
  ChildBuilderDelegateConfig,
  ResolvedDelegateOptions,
  ChildBuilderDelegate,
  SeparatedDelegateConfig,
  SeparatedChildBuilderDelegate,
} from "./types";
