/**
 * Type graph model
 *
 * Inference produces a raw tree of TypeNodes in which records are still
 * inline. Finalization turns that tree into a TypeGraph: every record lives
 * in a name-keyed table and every use-site points at it through a Reference.
 */

export type PrimitiveKind = "null" | "bool" | "int" | "float" | "string";

export interface PrimitiveNode {
  kind: "primitive";
  type: PrimitiveKind;
}

/** Element type of a collection that was never observed non-empty */
export interface UnknownNode {
  kind: "unknown";
}

export interface ArrayNode {
  kind: "array";
  element: TypeNode;
}

/** Never wraps another OptionalNode */
export interface OptionalNode {
  kind: "optional";
  inner: TypeNode;
}

/** Dynamic-key object; keys are always strings */
export interface MapNode {
  kind: "map";
  value: TypeNode;
}

export interface UnionNode {
  kind: "union";
  variants: TypeNode[];
}

export interface RecordField {
  /** Key exactly as it appeared in the input */
  name: string;
  type: TypeNode;
}

export interface RecordNode {
  kind: "record";
  /**
   * Name hint while the graph is raw, unique identifier once finalized
   */
  name: string;
  /** Value path where this shape was first observed, e.g. `users[].address` */
  path: string;
  fields: RecordField[];
}

export interface ReferenceNode {
  kind: "reference";
  name: string;
}

export type TypeNode =
  | PrimitiveNode
  | UnknownNode
  | ArrayNode
  | OptionalNode
  | MapNode
  | UnionNode
  | RecordNode
  | ReferenceNode;

export type TypeNodeKind = TypeNode["kind"];

/**
 * Output of inference, before dedup and naming
 */
export interface RawTypeGraph {
  rootName: string;
  root: TypeNode;
  sampleCount: number;
}

/**
 * Finalized graph. `records` keeps first-seen order; `root` and every field
 * type refer to records only through ReferenceNodes.
 */
export interface TypeGraph {
  rootName: string;
  root: TypeNode;
  records: ReadonlyMap<string, RecordNode>;
}

export const primitive = (type: PrimitiveKind): PrimitiveNode => ({
  kind: "primitive",
  type,
});

export const UNKNOWN: UnknownNode = { kind: "unknown" };

export const arrayOf = (element: TypeNode): ArrayNode => ({
  kind: "array",
  element,
});

export const mapOf = (value: TypeNode): MapNode => ({ kind: "map", value });

export const reference = (name: string): ReferenceNode => ({
  kind: "reference",
  name,
});

/**
 * Wrap a node in Optional without ever nesting Optionals
 */
export function optional(inner: TypeNode): OptionalNode {
  return inner.kind === "optional" ? inner : { kind: "optional", inner };
}

export function stripOptional(node: TypeNode): TypeNode {
  return node.kind === "optional" ? node.inner : node;
}
