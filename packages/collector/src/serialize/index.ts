export {
  serializeRegistry,
  writeRegistry,
  toWireRegistry,
  toWireInterface,
  stableStringify,
  INDENT,
  type JsonValue,
  type WireRegistry,
  type WireInterface,
  type WireConst,
  type WireAttribute,
  type WireOperation,
  type WireExtAttribute,
} from "./serializer.js";
