/**
 * Outcome of a folder-tree mutation: the changed entity and the active
 * documents whose effective Standard may have changed and need validating.
 */
export type TreeMutation<T> = {
  result: T;
  affectedDocumentIds: string[];
};
