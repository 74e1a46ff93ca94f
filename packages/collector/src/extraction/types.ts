/** Canonical record of one interface, partial fragments and mixins folded in */
export interface InterfaceRecord {
  readonly name: string;
  /** Provenance of the defining document */
  readonly filePath: string;
  /** Provenance of every merged partial fragment, in merge order */
  readonly partialFilePaths: readonly string[];
  readonly consts: readonly ConstRecord[];
  readonly attributes: readonly AttributeRecord[];
  readonly operations: readonly OperationRecord[];
  readonly extAttributes: readonly ExtAttributeRecord[];
  readonly inherit: readonly InheritRecord[];
}

export interface ConstRecord {
  readonly name: string;
  readonly type: string;
  readonly value: string;
  readonly extAttributes: readonly ExtAttributeRecord[];
}

export interface AttributeRecord {
  readonly name: string;
  readonly type: string;
  readonly extAttributes: readonly ExtAttributeRecord[];
  readonly readonly: boolean;
  readonly static: boolean;
}

export interface OperationRecord {
  /** Declared name, or a special-operation sentinel such as `__getter__` */
  readonly name: string;
  readonly arguments: readonly ArgumentRecord[];
  readonly type: string;
  readonly extAttributes: readonly ExtAttributeRecord[];
  readonly static: boolean;
}

export interface ArgumentRecord {
  readonly name: string;
  readonly type: string;
}

export interface ExtAttributeRecord {
  readonly name: string;
}

export interface InheritRecord {
  readonly parent: string;
}

/** `target includes reference;` (formerly `target implements reference;`) */
export interface MixinRelation {
  readonly target: string;
  /** Absent for declaration-only relations, which contribute nothing */
  readonly reference: string | undefined;
}

/** Member kinds that partial and mixin merges fold together */
export type MemberListKey = "consts" | "attributes" | "operations";

/** Name-keyed registry of canonical records */
export type InterfaceRegistry = ReadonlyMap<string, InterfaceRecord>;
