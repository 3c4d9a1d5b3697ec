/**
 * seplist - Build Context
 */

import { DEFAULT_CLASS_PREFIX } from "./constants";
import type { BuildContext } from "./types";

export interface BuildContextOptions {
  /** Document to create elements in (default: the global document) */
  document?: Document;
  /** Custom CSS class prefix (default: 'seplist') */
  classPrefix?: string;
}

/**
 * Create the context passed to builders.
 * Throws when no document is given and none exists globally.
 */
export const createBuildContext = (
  options: BuildContextOptions = {},
): BuildContext => {
  const doc =
    options.document ??
    (typeof document !== "undefined" ? document : undefined);

  if (!doc) {
    throw new Error("[seplist] A document is required to build elements");
  }

  return {
    document: doc,
    classPrefix: options.classPrefix ?? DEFAULT_CLASS_PREFIX,
  };
};
