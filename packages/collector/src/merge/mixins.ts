import type { InterfaceRegistry, MixinRelation } from "../extraction/types.js";
import { CollectorError, CollectorErrorCode } from "../errors.js";
import { nullLogger, type Logger } from "../types.js";
import { appendMembers } from "./members.js";

/**
 * Append the members of each relation's referenced interface to its target.
 *
 * References are read from `registry` as passed in, so a mixin that is
 * itself the target of another relation contributes only its own (and its
 * partials') members; contributions are not chained within one pass.
 * Several relations on one target apply in relation order.
 *
 * Relations without a reference are skipped. Unlike `mergePartials`, an
 * unknown target or reference name is fatal.
 *
 * Returns a new registry; `registry` and its records are left untouched.
 */
export function mergeMixins(
  registry: InterfaceRegistry,
  relations: readonly MixinRelation[],
  logger: Logger = nullLogger,
): InterfaceRegistry {
  const merged = new Map(registry);

  for (const { target: targetName, reference: referenceName } of relations) {
    if (referenceName === undefined) {
      logger.log(`[mixins] '${targetName}' declares a relation without a reference; skipped`);
      continue;
    }

    const target = merged.get(targetName);
    if (!target) {
      throw new CollectorError(
        `Mixin target '${targetName}' (includes '${referenceName}') is not a known interface`,
        CollectorErrorCode.UNKNOWN_MIXIN_TARGET,
        targetName,
      );
    }

    const reference = registry.get(referenceName);
    if (!reference) {
      throw new CollectorError(
        `Mixin '${referenceName}' included by '${targetName}' is not a known interface`,
        CollectorErrorCode.UNKNOWN_MIXIN_REFERENCE,
        referenceName,
      );
    }

    merged.set(targetName, { ...target, ...appendMembers(target, reference) });
  }

  return merged;
}
