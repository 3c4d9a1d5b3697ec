/**
 * seplist/delegate — Plain Child-Builder Delegate
 * Builds children on demand for a host list pipeline and applies the
 * keep-alive, repaint-boundary and semantic-index decorations.
 */

// Debug flag - set to true to enable logging
const DEBUG = false;
const log = (...args: unknown[]) => {
  if (DEBUG) console.log("[seplist/delegate]", ...args);
};

import {
  BOUNDARY_CLASS_SUFFIX,
  DEFAULT_ADD_AUTOMATIC_KEEP_ALIVES,
  DEFAULT_ADD_REPAINT_BOUNDARIES,
  DEFAULT_ADD_SEMANTIC_INDEXES,
  DEFAULT_SEMANTIC_INDEX_OFFSET,
} from "../constants";
import type {
  BuildContext,
  ChildBuilder,
  ChildBuilderDelegate,
  ChildBuilderDelegateConfig,
  ResolvedDelegateOptions,
  SemanticIndexCallback,
  TemplateResult,
} from "../types";

// =============================================================================
// Helpers
// =============================================================================

const defaultSemanticIndexCallback: SemanticIndexCallback = (_element, index) =>
  index;

/** Wrap markup in a div; elements pass through */
export const toElement = (
  context: BuildContext,
  result: TemplateResult,
): HTMLElement => {
  if (typeof result !== "string") return result;
  const element = context.document.createElement("div");
  element.innerHTML = result;
  return element;
};

/** True for integers >= 0 */
export const isCount = (value: number): boolean =>
  Number.isInteger(value) && value >= 0;

export const resolveDelegateOptions = (
  config: ChildBuilderDelegateConfig,
): ResolvedDelegateOptions => {
  const childCount = config.childCount ?? null;
  return {
    addAutomaticKeepAlives:
      config.addAutomaticKeepAlives ?? DEFAULT_ADD_AUTOMATIC_KEEP_ALIVES,
    addRepaintBoundaries:
      config.addRepaintBoundaries ?? DEFAULT_ADD_REPAINT_BOUNDARIES,
    addSemanticIndexes:
      config.addSemanticIndexes ?? DEFAULT_ADD_SEMANTIC_INDEXES,
    findChildIndexCallback: config.findChildIndexCallback ?? null,
    semanticIndexCallback:
      config.semanticIndexCallback ?? defaultSemanticIndexCallback,
    semanticIndexOffset:
      config.semanticIndexOffset ?? DEFAULT_SEMANTIC_INDEX_OFFSET,
    semanticChildCount:
      config.semanticChildCount === undefined
        ? childCount
        : config.semanticChildCount,
  };
};

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a delegate that supplies children through `builder`.
 *
 * `builder` is called with indices from 0 up to `childCount - 1`, or without
 * bound when `childCount` is null, in which case returning `null` ends the
 * list.
 *
 * ```ts
 * const delegate = createChildBuilderDelegate(
 *   (ctx, i) => `<span>${rows[i].title}</span>`,
 *   { childCount: rows.length },
 * )
 * const el = delegate.build(createBuildContext(), 0)
 * ```
 */
export const createChildBuilderDelegate = (
  builder: ChildBuilder,
  config: ChildBuilderDelegateConfig = {},
): ChildBuilderDelegate => {
  if (typeof builder !== "function") {
    throw new Error("[seplist] builder is required");
  }

  const childCount = config.childCount ?? null;
  if (childCount !== null && !isCount(childCount)) {
    throw new Error("[seplist] childCount must be a non-negative integer");
  }

  const options = resolveDelegateOptions(config);
  const {
    addAutomaticKeepAlives,
    addRepaintBoundaries,
    addSemanticIndexes,
    findChildIndexCallback,
    semanticIndexCallback,
    semanticIndexOffset,
    semanticChildCount,
  } = options;

  const build = (context: BuildContext, index: number): HTMLElement | null => {
    if (index < 0 || (childCount !== null && index >= childCount)) {
      log("build: index out of range", index, childCount);
      return null;
    }

    const result = builder(context, index);
    if (result === null) {
      log("build: no child at", index);
      return null;
    }

    const element = toElement(context, result);
    element.dataset.index = String(index);

    if (addRepaintBoundaries) {
      element.classList.add(`${context.classPrefix}-${BOUNDARY_CLASS_SUFFIX}`);
    }

    if (addSemanticIndexes) {
      const semanticIndex = semanticIndexCallback(element, index);
      if (semanticIndex !== null) {
        element.setAttribute(
          "aria-posinset",
          String(semanticIndex + semanticIndexOffset + 1),
        );
        if (semanticChildCount !== null) {
          element.setAttribute("aria-setsize", String(semanticChildCount));
        }
      }
    }

    if (addAutomaticKeepAlives) {
      element.dataset.keepAlive = "true";
    }

    return element;
  };

  const findIndexByKey = (key: string): number | null => {
    if (!findChildIndexCallback) return null;
    return findChildIndexCallback(key) ?? null;
  };

  return {
    childCount,
    estimatedChildCount: childCount,
    options,
    build,
    findIndexByKey,
  };
};
