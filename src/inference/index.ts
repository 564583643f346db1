/**
 * Static analysis over parsed expressions.
 */

export {
  formatInferredType,
  inferType,
  inferTypeWithFocus,
  systemType,
  typeFromSpecifier,
  type ElementTable,
  type InferenceEnvironment,
  type InferredType,
} from './type-inference.js';
export {
  formatDebugTree,
  toDebugTree,
  type DebugTreeNode,
} from './debug-tree.js';
