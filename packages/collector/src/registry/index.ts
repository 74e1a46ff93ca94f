export {
  buildRegistry,
  collectRegistry,
  collectDefinitions,
  collectInterfaces,
  collectPartials,
  collectMixinRelations,
  type BuildRegistryOptions,
  type CollectRegistryOptions,
} from "./builder.js";
