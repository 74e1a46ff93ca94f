export { extractInterfaceRecord, extractMixinRelation, isInterface, isPartialInterface, isMixinRelation } from "./extractor.js";
export {
  extractConst,
  extractAttribute,
  extractOperation,
  extractArgument,
  extractExtAttributes,
  extractInherit,
  extractTypeName,
  operationName,
  GETTER_NAME,
  SETTER_NAME,
  DELETER_NAME,
} from "./members.js";
export { toProvenancePath, trimCharacters } from "./file-path.js";
export type {
  InterfaceRecord,
  InterfaceRegistry,
  ConstRecord,
  AttributeRecord,
  OperationRecord,
  ArgumentRecord,
  ExtAttributeRecord,
  InheritRecord,
  MixinRelation,
  MemberListKey,
} from "./types.js";
