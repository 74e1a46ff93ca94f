export type { IdlNode, NodePropertyValue } from "./node.js";
export { NodeClass, NodeProperty } from "./node.js";
export { TreeNode, createNode, type TreeNodeInit } from "./tree-node.js";
