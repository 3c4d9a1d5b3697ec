/**
 * seplist/delegate — Separated Delegate
 * Interleaves separators between items by remapping child indices onto two
 * builders:
 *
 *   Items:      [item0,       item1,       item2]
 *   Children:   [item0, sep0, item1, sep1, item2]
 *   Index:      [  0,     1,    2,     3,    4  ]
 *
 * Even child indices are items, odd ones separators; both logical indices
 * are `Math.floor(index / 2)`.
 */

import { ITEM_CLASS_SUFFIX, SEPARATOR_CLASS_SUFFIX } from "../constants";
import type {
  BuildContext,
  SeparatedChildBuilderDelegate,
  SeparatedDelegateConfig,
} from "../types";
import { createChildBuilderDelegate, isCount, toElement } from "./builder";

/**
 * Number of children for `itemCount` items, separators included.
 * 0 → 0, 1 → 1, n → 2n - 1. Non-finite counts give 0.
 */
export const computeActualChildCount = (itemCount: number): number => {
  if (!Number.isFinite(itemCount)) return 0;
  return Math.max(0, itemCount * 2 - 1);
};

/** Semantic index of a child: items count, separators do not */
export const separatedSemanticIndex = (
  _element: HTMLElement,
  index: number,
): number | null => (index % 2 === 0 ? Math.floor(index / 2) : null);

/**
 * Create a delegate whose children are the items built by `itemBuilder`
 * with one separator from `separatorBuilder` between each pair.
 *
 * The first separator comes after the first item and the last separator
 * before the last item, so `separatorBuilder` is called with indices in
 * [0, itemCount - 1).
 *
 * `addAutomaticKeepAlives`, `addRepaintBoundaries`, `addSemanticIndexes` and
 * `findChildIndexCallback` go unchanged to the underlying plain delegate.
 * `findChildIndexCallback` works in child indices (separators included).
 *
 * @example
 * ```ts
 * const delegate = createSeparatedDelegate({
 *   itemCount: messages.length,
 *   itemBuilder: (ctx, i) => `<p>${messages[i].text}</p>`,
 *   separatorBuilder: () => '<hr>',
 * })
 * ```
 */
export const createSeparatedDelegate = (
  config: SeparatedDelegateConfig,
): SeparatedChildBuilderDelegate => {
  const { itemBuilder, itemCount, separatorBuilder } = config;

  // Validate
  if (typeof itemBuilder !== "function") {
    throw new Error("[seplist] itemBuilder is required");
  }
  if (typeof separatorBuilder !== "function") {
    throw new Error("[seplist] separatorBuilder is required");
  }
  if (typeof itemCount !== "number" || !isCount(itemCount)) {
    throw new Error("[seplist] itemCount must be a non-negative integer");
  }

  const childCount = computeActualChildCount(itemCount);

  const buildChild = (context: BuildContext, index: number): HTMLElement => {
    const logicalIndex = Math.floor(index / 2);

    if (index % 2 === 0) {
      const item = toElement(context, itemBuilder(context, logicalIndex));
      item.classList.add(`${context.classPrefix}-${ITEM_CLASS_SUFFIX}`);
      return item;
    }

    const separator = toElement(
      context,
      separatorBuilder(context, logicalIndex),
    );
    separator.classList.add(`${context.classPrefix}-${SEPARATOR_CLASS_SUFFIX}`);
    separator.setAttribute("role", "separator");
    return separator;
  };

  const delegate = createChildBuilderDelegate(buildChild, {
    childCount,
    addAutomaticKeepAlives: config.addAutomaticKeepAlives,
    addRepaintBoundaries: config.addRepaintBoundaries,
    addSemanticIndexes: config.addSemanticIndexes,
    findChildIndexCallback: config.findChildIndexCallback,
    semanticIndexCallback: separatedSemanticIndex,
    semanticChildCount: itemCount,
  });

  return {
    ...delegate,
    itemCount,
    childCount,
    estimatedChildCount: childCount,
  };
};
