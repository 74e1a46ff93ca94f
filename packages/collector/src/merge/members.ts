import type { InterfaceRecord, MemberListKey } from "../extraction/types.js";

export type MemberLists = Pick<InterfaceRecord, MemberListKey>;

/**
 * Member lists of `target` followed by those of `source`. Nothing is
 * deduplicated, so applying the same source twice duplicates its members.
 */
export function appendMembers(target: MemberLists, source: MemberLists): MemberLists {
  return {
    consts: [...target.consts, ...source.consts],
    attributes: [...target.attributes, ...source.attributes],
    operations: [...target.operations, ...source.operations],
  };
}
