export { createWebIdlParser, typeName, rewriteImplements, type TypeDescription, type DocumentParser, type WebIdlParserOptions } from "./webidl-parser.js";
