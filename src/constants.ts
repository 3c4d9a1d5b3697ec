/**
 * seplist - Constants
 * All default values in one place
 */

/** Default CSS class prefix */
export const DEFAULT_CLASS_PREFIX = "seplist";

// =============================================================================
// Delegate Defaults
// =============================================================================

/** Mark children with data-keep-alive by default */
export const DEFAULT_ADD_AUTOMATIC_KEEP_ALIVES = true;

/** Add the repaint boundary class by default */
export const DEFAULT_ADD_REPAINT_BOUNDARIES = true;

/** Set aria-posinset / aria-setsize by default */
export const DEFAULT_ADD_SEMANTIC_INDEXES = true;

/** Offset added to semantic indexes */
export const DEFAULT_SEMANTIC_INDEX_OFFSET = 0;

// =============================================================================
// Class Suffixes
// =============================================================================

/** `${prefix}-boundary` — style with `contain: paint` */
export const BOUNDARY_CLASS_SUFFIX = "boundary";

/** `${prefix}-item` on children built by an item builder */
export const ITEM_CLASS_SUFFIX = "item";

/** `${prefix}-separator` on children built by a separator builder */
export const SEPARATOR_CLASS_SUFFIX = "separator";
