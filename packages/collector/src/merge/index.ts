export { mergePartials, type PartialFragments } from "./partials.js";
export { mergeMixins } from "./mixins.js";
export { appendMembers, type MemberLists } from "./members.js";
