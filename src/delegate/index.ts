/**
 * seplist/delegate - Child-builder delegates
 */

export {
  createChildBuilderDelegate,
  resolveDelegateOptions,
  toElement,
} from "./builder";

export {
  createSeparatedDelegate,
  computeActualChildCount,
  separatedSemanticIndex,
} from "./separated";
