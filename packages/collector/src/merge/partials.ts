import type { InterfaceRecord, InterfaceRegistry } from "../extraction/types.js";
import { nullLogger, type Logger } from "../types.js";
import { appendMembers } from "./members.js";

/** Partial fragments keyed by the name of the interface they extend, in input order */
export type PartialFragments = ReadonlyMap<string, readonly InterfaceRecord[]>;

/**
 * Fold partial fragments into their base interfaces.
 *
 * Constants, attributes and operations of each fragment are appended after
 * the base's, and the fragment's provenance is appended to
 * `partialFilePaths`. Extended attributes and inheritance stay with the base.
 *
 * A fragment whose base is not in `registry` is dropped. This is not an
 * error: unlike `mergeMixins`, missing names are tolerated here.
 *
 * Returns a new registry; `registry` and its records are left untouched.
 */
export function mergePartials(
  registry: InterfaceRegistry,
  partials: PartialFragments,
  logger: Logger = nullLogger,
): InterfaceRegistry {
  const merged = new Map(registry);

  for (const [name, fragments] of partials) {
    const base = merged.get(name);
    if (!base) {
      logger.log(`[partials] dropped ${fragments.length} fragment(s) of '${name}': no base interface`);
      continue;
    }
    merged.set(name, fragments.reduce(applyFragment, base));
  }

  return merged;
}

function applyFragment(base: InterfaceRecord, fragment: InterfaceRecord): InterfaceRecord {
  return {
    ...base,
    ...appendMembers(base, fragment),
    partialFilePaths: [...base.partialFilePaths, fragment.filePath],
  };
}
