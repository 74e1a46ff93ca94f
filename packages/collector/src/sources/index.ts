export { readPathList, parsePathList, formatPathList, writePathList } from "./path-list.js";
export { discoverDocuments } from "./discover.js";
